/**
 * Shipping price calculation
 * Formula: base price + (total weight in ounces x per-ounce rate), clamped to the tier's range
 */

import { Dimensions, PriceQuote, ServiceTier } from '../types/domain';
import { DEFAULT_SERVICE_ID, SERVICE_TIERS } from '../config/tiers';
import { logger } from '../config/logger';
import { ShippingError, ErrorCode } from '../errors';

const log = logger.child('pricing');

const OUNCES_PER_POUND = 16;

/**
 * Round half up to cents
 */
export function roundCurrency(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function totalOunces(weightLbs?: number, weightOz?: number): number {
  const total = (weightLbs || 0) * OUNCES_PER_POUND + (weightOz || 0);
  // Packages without any weight price as 1 oz
  return total === 0 ? 1 : total;
}

export class PriceQuoter {
  private readonly tiers: readonly ServiceTier[];

  constructor(tiers: readonly ServiceTier[] = SERVICE_TIERS) {
    this.tiers = tiers;
  }

  get serviceIds(): string[] {
    return this.tiers.map((tier) => tier.id);
  }

  hasService(id: string): boolean {
    return this.tiers.some((tier) => tier.id === id);
  }

  /**
   * Dimensions are accepted for symmetry with the package model but do not affect the price
   */
  quote(serviceId: string, weightLbs?: number, weightOz?: number, _dimensions?: Dimensions): number {
    const tier = this.tiers.find((candidate) => candidate.id === serviceId);
    if (!tier) {
      log.warn(`Unknown shipping service: ${serviceId}`);
      throw new ShippingError(ErrorCode.UNKNOWN_SERVICE, `Unknown shipping service: ${serviceId}`, {
        details: { service: serviceId },
      });
    }

    return this.priceFor(tier, weightLbs, weightOz);
  }

  /**
   * Every tier with its price, cheapest first (ties keep configuration order)
   */
  quoteAll(weightLbs?: number, weightOz?: number, _dimensions?: Dimensions): PriceQuote[] {
    return this.tiers
      .map((tier) => ({
        id: tier.id,
        name: tier.name,
        basePrice: tier.basePrice,
        perOunceRate: tier.perOunceRate,
        price: this.priceFor(tier, weightLbs, weightOz),
      }))
      .sort((a, b) => a.price - b.price);
  }

  cheapest(weightLbs?: number, weightOz?: number, dimensions?: Dimensions): string {
    const [first] = this.quoteAll(weightLbs, weightOz, dimensions);
    return first ? first.id : DEFAULT_SERVICE_ID;
  }

  private priceFor(tier: ServiceTier, weightLbs?: number, weightOz?: number): number {
    const ounces = totalOunces(weightLbs, weightOz);
    const raw = tier.basePrice + ounces * tier.perOunceRate;
    const price = roundCurrency(Math.min(Math.max(raw, tier.minPrice), tier.maxPrice));

    log.debug(`Calculated price for ${tier.id}: $${price.toFixed(2)} (weight: ${ounces} oz)`);

    return price;
  }
}
