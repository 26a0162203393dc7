/**
 * Shipping service tiers offered to customers
 */

import { ServiceTier } from '../types/domain';

export const DEFAULT_SERVICE_ID = 'ground_shipping';

export const SERVICE_TIERS: readonly ServiceTier[] = [
  {
    id: 'priority_mail',
    name: 'Priority Mail',
    basePrice: 5.0,
    perOunceRate: 0.1,
    minPrice: 4.0,
    maxPrice: 8.0,
  },
  {
    id: 'ground_shipping',
    name: 'Ground Shipping',
    basePrice: 2.5,
    perOunceRate: 0.05,
    minPrice: 2.0,
    maxPrice: 5.0,
  },
];
