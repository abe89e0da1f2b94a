#!/usr/bin/env node
import 'dotenv/config';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadMarketDataConfig } from './config.js';
import { registerCryptoTools } from './tools/crypto.js';
import { registerStockTools } from './tools/stocks.js';
import { registerTechnicalTools } from './tools/technicals.js';
import { createVendorClients } from './vendors.js';

const clients = createVendorClients(loadMarketDataConfig());

const server = new McpServer({
  name: 'marketshell-market-data',
  version: '0.1.0',
});

registerCryptoTools(server, clients);
registerStockTools(server, clients);
registerTechnicalTools(server, clients);

const transport = new StdioServerTransport();
await server.connect(transport);
