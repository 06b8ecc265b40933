import { randomUUID } from 'crypto';
import { Product } from '../product.entity';

const ADJECTIVES = [
  'Awesome', 'Cool', 'Smart', 'Innovative', 'Premium',
  'Classic', 'Elegant', 'Advanced', 'Ultimate', 'Pro',
];

const PRODUCT_TYPES = [
  'Gadget', 'Device', 'Tool', 'Accessory', 'Electronics',
  'Appliance', 'Instrument', 'Machine', 'Equipment', 'System',
];

export const MIN_PRICE = 10;
export const MAX_PRICE = 1000;

export interface RandomProductSeed {
  name: string;
  description: string;
  price: number;
}

/** mulberry32: small, fast, seedable PRNG returning floats in [0, 1) */
function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Synthetic product data for bulk-load demos. The random source is seeded
 * once per generator, so two generators built with the same seed produce the
 * same names, descriptions and prices (ids are always fresh UUIDs).
 */
export class RandomProductGenerator {
  private readonly random: () => number;

  constructor(
    readonly seed: number = Date.now(),
    private readonly newId: () => string = randomUUID,
  ) {
    this.random = mulberry32(seed);
  }

  next(): RandomProductSeed {
    const adjective = this.pick(ADJECTIVES);
    const productType = this.pick(PRODUCT_TYPES);
    const name = `${adjective} ${productType}`;

    return {
      name,
      description: `A ${name.toLowerCase()} designed for modern needs.`,
      // truncated to cents so it never reaches MAX_PRICE
      price: Math.floor((MIN_PRICE + this.random() * (MAX_PRICE - MIN_PRICE)) * 100) / 100,
    };
  }

  generate(now: Date = new Date()): Product {
    return {
      id: this.newId(),
      ...this.next(),
      createdAt: new Date(now.getTime()),
      updatedAt: new Date(now.getTime()),
    };
  }

  generateMany(count: number, now: Date = new Date()): Product[] {
    return Array.from({ length: count }, () => this.generate(now));
  }

  private pick<T>(items: readonly T[]): T {
    return items[Math.floor(this.random() * items.length)];
  }
}
