import { ASSET_CLASSES, AssetClass } from '@/constants/analysis';

/**
 * Ticker conventions used by the price source:
 * - Plain ISO codes ('USD', 'EUR', 'GBP') are cash balances
 * - 'EURUSD=X' is an FX pair; its price is quoted in the second currency
 * - '^GSPC' is an index, 'GC=F' a future, 'BTC-EUR' a crypto pair
 */
const CASH_CURRENCIES = ['USD', 'EUR', 'GBP'];
const FX_TICKER = /^([A-Z]{3})([A-Z]{3})=X$/;
const CRYPTO_QUOTES = ['USD', 'EUR', 'GBP'];

export function isCurrency(ticker: string): boolean {
  return CASH_CURRENCIES.includes(ticker);
}

export function isFx(ticker: string): boolean {
  return FX_TICKER.test(ticker);
}

/**
 * Native currency of a ticker, USD when nothing in the ticker says otherwise
 */
export function detectCurrency(ticker: string): string {
  if (isCurrency(ticker)) return ticker;

  const fx = FX_TICKER.exec(ticker);
  if (fx?.[2]) return fx[2];

  for (const quote of CRYPTO_QUOTES) {
    if (ticker.includes(`-${quote}`)) return quote;
  }
  return 'USD';
}

export function inferAssetClass(ticker: string): AssetClass {
  if (isCurrency(ticker)) return ASSET_CLASSES.CURRENCY;
  if (isFx(ticker)) return ASSET_CLASSES.FX;
  if (ticker.startsWith('^')) return ASSET_CLASSES.EQUITY_INDEX;
  if (CRYPTO_QUOTES.some((quote) => ticker.endsWith(`-${quote}`))) return ASSET_CLASSES.CRYPTO;
  if (ticker.endsWith('=F')) return ASSET_CLASSES.COMMODITY;
  return ASSET_CLASSES.STOCK;
}

/**
 * Key used for FX pairs throughout the service: 'EUR/USD'
 */
export function pairKey(base: string, quote: string): string {
  return `${base}/${quote}`;
}

const KNOWN_CLASSES: readonly string[] = Object.values(ASSET_CLASSES);

export function isAssetClass(value: unknown): value is AssetClass {
  return typeof value === 'string' && KNOWN_CLASSES.includes(value);
}
