import { coingecko, ethGasStation, type Table } from '@marketshell/market-data';
import { z } from 'zod';
import { ArgumentError, defineArgs } from '../args/parser.js';
import { choice, EXPORT_FLAG, exportFormat, positiveInt, positiveNumber, text } from '../args/types.js';
import type { MenuDeps } from './command.js';
import { Menu, type HelpSection } from './menu.js';
import type { CoinSession } from './session.js';

function exportOnly(prog: string, description: string) {
  return defineArgs({
    prog,
    description,
    schema: z.object({ export: exportFormat }),
    flags: { export: EXPORT_FLAG },
  });
}

function extremeArgs(prog: string, description: string) {
  return defineArgs({
    prog,
    description,
    schema: z.object({ vs: choice(['usd', 'btc']).default('usd'), export: exportFormat }),
    flags: { vs: { flag: '--vs', help: 'currency (default: usd)', metavar: '{usd,btc}' }, export: EXPORT_FLAG },
  });
}

const VIEWS: ReadonlyArray<readonly [name: string, help: string, view: (coin: coingecko.Coin) => Table]> = [
  ['info', 'basic information about the loaded coin', coingecko.coinInfo],
  ['market', 'market stats about the loaded coin', coingecko.coinMarket],
  ['web', 'websites found for the loaded coin, e.g. forum, homepage', coingecko.coinWebsites],
  ['social', 'social portals urls for the loaded coin, e.g. reddit, twitter', coingecko.coinSocialMedia],
  ['dev', 'github and bitbucket development stats for the loaded coin', coingecko.coinDeveloperData],
  ['score', 'different kind of scores for the loaded coin, e.g. developer score', coingecko.coinScores],
  ['bc', 'block-chain explorers urls for the loaded coin', coingecko.coinBlockchainExplorers],
];

const ATH_ARGS = extremeArgs('ath', 'All time high data for the loaded coin.');
const ATL_ARGS = extremeArgs('atl', 'All time low data for the loaded coin.');

const PRT_ARGS = defineArgs({
  prog: 'prt',
  description:
    'Potential returns: the price the loaded coin would have with the market cap of another coin, ' +
    'of each of the top N coins, or at a target price.',
  schema: z.object({
    vs: text.optional(),
    top: positiveInt.optional(),
    price: positiveNumber.optional(),
    export: exportFormat,
  }),
  flags: {
    vs: { flag: '--vs', help: 'coin to compare market caps with' },
    top: { flag: '--top', alias: '-t', help: 'compare with the top N coins by market cap' },
    price: { flag: '--price', alias: '-p', help: 'target price for the loaded coin' },
    export: EXPORT_FLAG,
  },
});

const GWEI_ARGS = exportOnly('gwei', 'Current Ethereum gas fees [EthGasStation].');

export class CryptoMenu extends Menu {
  protected readonly title = 'Cryptocurrency';

  constructor(
    deps: MenuDeps,
    private readonly coin: CoinSession,
  ) {
    super(deps, '(crypto)> ');
    const { clients } = deps;
    const load = () => coingecko.getCoin(clients.coingecko, coin.id);

    for (const [name, , view] of VIEWS) {
      this.command(name, exportOnly(name, `${name} view for the loaded coin [CoinGecko].`), async options => {
        await this.show(view(await load()), name, options.export);
      });
    }

    this.command('ath', ATH_ARGS, async options => {
      await this.show(coingecko.coinAllTimeHigh(await load(), options.vs), 'ath', options.export);
    });

    this.command('atl', ATL_ARGS, async options => {
      await this.show(coingecko.coinAllTimeLow(await load(), options.vs), 'atl', options.export);
    });

    this.command('prt', PRT_ARGS, async options => {
      if (options.vs === undefined && options.top === undefined && options.price === undefined) {
        throw new ArgumentError('prt', 'one of --vs, --top or --price is required');
      }
      const table = await coingecko.coinPotentialReturns(clients.coingecko, coin.id, {
        vs: options.vs,
        top: options.top,
        price: options.price,
      });
      await this.show(table, 'prt', options.export);
    });

    this.command('gwei', GWEI_ARGS, async options => {
      await this.show(await ethGasStation.gweiFees(clients.ethGasStation), 'gwei', options.export);
    });
  }

  protected helpSections(): HelpSection[] {
    return [
      {
        title: `Coin: ${this.coin.name} (${this.coin.symbol.toUpperCase()})`,
        commands: [
          ...VIEWS.map(([name, help]) => [name, `${help} [CoinGecko]`] as const),
          ['ath', 'all time high for the loaded coin [CoinGecko]'],
          ['atl', 'all time low for the loaded coin [CoinGecko]'],
          ['prt', 'potential returns of the loaded coin [CoinGecko]'],
          ['gwei', 'current Ethereum gas fees [EthGasStation]'],
        ],
      },
    ];
  }
}
