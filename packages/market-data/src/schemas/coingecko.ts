import { z } from 'zod';

const CurrencyMap = z.record(z.string(), z.number().nullable()).nullish().transform(v => v ?? {});
const DateMap = z.record(z.string(), z.string().nullable()).nullish().transform(v => v ?? {});
const UrlList = z.array(z.string()).nullish().transform(v => (v ?? []).filter(u => u.length > 0));

export const CoinLinksSchema = z.object({
  homepage: UrlList,
  blockchain_site: UrlList,
  official_forum_url: UrlList,
  chat_url: UrlList,
  announcement_url: UrlList,
  twitter_screen_name: z.string().nullish(),
  facebook_username: z.string().nullish(),
  telegram_channel_identifier: z.string().nullish(),
  subreddit_url: z.string().nullish(),
  repos_url: z
    .object({ github: UrlList, bitbucket: UrlList })
    .partial()
    .nullish(),
});

export const CoinMarketDataSchema = z.object({
  current_price: CurrencyMap,
  market_cap: CurrencyMap,
  total_volume: CurrencyMap,
  high_24h: CurrencyMap,
  low_24h: CurrencyMap,
  ath: CurrencyMap,
  ath_change_percentage: CurrencyMap,
  ath_date: DateMap,
  atl: CurrencyMap,
  atl_change_percentage: CurrencyMap,
  atl_date: DateMap,
  circulating_supply: z.number().nullish(),
  total_supply: z.number().nullish(),
  max_supply: z.number().nullish(),
  price_change_percentage_24h: z.number().nullish(),
  price_change_percentage_7d: z.number().nullish(),
  price_change_percentage_30d: z.number().nullish(),
});

export const CoinSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  name: z.string(),
  hashing_algorithm: z.string().nullish(),
  categories: z.array(z.string().nullable()).nullish().transform(v => (v ?? []).filter((c): c is string => !!c)),
  description: z.object({ en: z.string().nullish() }).partial().nullish(),
  genesis_date: z.string().nullish(),
  market_cap_rank: z.number().nullish(),
  coingecko_rank: z.number().nullish(),
  coingecko_score: z.number().nullish(),
  developer_score: z.number().nullish(),
  community_score: z.number().nullish(),
  liquidity_score: z.number().nullish(),
  public_interest_score: z.number().nullish(),
  sentiment_votes_up_percentage: z.number().nullish(),
  sentiment_votes_down_percentage: z.number().nullish(),
  links: CoinLinksSchema.nullish(),
  market_data: CoinMarketDataSchema.nullish(),
  community_data: z
    .object({
      facebook_likes: z.number().nullish(),
      twitter_followers: z.number().nullish(),
      reddit_subscribers: z.number().nullish(),
      reddit_average_posts_48h: z.number().nullish(),
      telegram_channel_user_count: z.number().nullish(),
    })
    .nullish(),
  developer_data: z
    .object({
      forks: z.number().nullish(),
      stars: z.number().nullish(),
      subscribers: z.number().nullish(),
      total_issues: z.number().nullish(),
      closed_issues: z.number().nullish(),
      pull_requests_merged: z.number().nullish(),
      pull_request_contributors: z.number().nullish(),
      commit_count_4_weeks: z.number().nullish(),
    })
    .nullish(),
});

export type Coin = z.output<typeof CoinSchema>;

export const SimplePriceSchema = z.record(
  z.string(),
  z.object({
    usd: z.number(),
    usd_market_cap: z.number(),
  }),
);

export const CoinMarketsSchema = z.array(
  z.object({
    id: z.string(),
    symbol: z.string(),
    name: z.string(),
    current_price: z.number().nullable(),
    market_cap: z.number().nullable(),
  }),
);
