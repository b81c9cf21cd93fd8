/**
 * Seeded Random Number Generator for reproducible example data
 * xoroshiro64* over two 32-bit words
 */

export interface RNGState {
  s0: number;
  s1: number;
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/** 32-bit integer hash used to spread a seed over the state words */
function mix32(x: number): number {
  x = Math.imul((x >>> 16) ^ x, 0x45d9f3b);
  x = Math.imul((x >>> 16) ^ x, 0x45d9f3b);
  return ((x >>> 16) ^ x) >>> 0;
}

export class SeededRNG {
  private state: RNGState;

  constructor(seed: number) {
    this.state = this.initializeFromSeed(seed);
  }

  private initializeFromSeed(seed: number): RNGState {
    const s0 = mix32(seed >>> 0);
    const s1 = mix32((s0 + 0x9e3779b9) >>> 0);
    return { s0: s0 || 1, s1: s1 || 1 }; // Ensure non-zero
  }

  /**
   * Get current state for serialization
   */
  getState(): RNGState {
    return { ...this.state };
  }

  /**
   * Generate next random uint32
   */
  private next(): number {
    const s0 = this.state.s0;
    let s1 = this.state.s1;

    const result = Math.imul(s0, 0x9e3779bb) >>> 0;

    s1 ^= s0;
    this.state.s0 = (rotl(s0, 26) ^ s1 ^ (s1 << 9)) >>> 0;
    this.state.s1 = rotl(s1, 13);

    return result;
  }

  /**
   * Generate random float in [0, 1)
   */
  random(): number {
    return this.next() / 0x100000000;
  }

  /**
   * Generate random float in [min, max)
   */
  randomRange(min: number, max: number): number {
    return min + this.random() * (max - min);
  }
}

/**
 * Create a hash from state for determinism verification
 */
export function hashState(obj: unknown): string {
  const str = JSON.stringify(obj, (_, value: unknown) => {
    if (value instanceof Map) {
      return Array.from(value.entries()).sort((a, b) =>
        String(a[0]).localeCompare(String(b[0]))
      );
    }
    if (typeof value === 'number' && !Number.isFinite(value)) {
      return String(value);
    }
    return value;
  });

  // Simple hash function (djb2)
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) + hash + str.charCodeAt(i)) >>> 0;
  }
  return hash.toString(16);
}
