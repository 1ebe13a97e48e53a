import { AssetClass } from '@/constants/analysis';

/**
 * Single closing price observation in the asset's native currency
 */
export interface PricePoint {
  timestamp: Date;
  price: number;
}

/**
 * Asset universe entry as stored in the 'assets' table
 */
export interface AssetDescriptor {
  ticker: string;
  currency: string;
  assetClass: AssetClass;
}

/**
 * Asset with its price history
 * Observations must be strictly increasing in time (checked at run start)
 */
export interface Asset extends AssetDescriptor {
  observations: PricePoint[];
}
