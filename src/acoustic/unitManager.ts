/** Context-independent phone units, interned per (name, filler) pair. */

export const SILENCE_NAME = 'SIL';

/** Marker for units carrying no left/right context. */
export const EMPTY_CONTEXT = Object.freeze({ kind: 'empty' as const });
export type Context = typeof EMPTY_CONTEXT;

export class Unit {
  constructor(
    readonly id: number,
    readonly name: string,
    readonly filler: boolean,
    readonly context: Context = EMPTY_CONTEXT,
  ) {}

  get isSilence(): boolean {
    return this.name === SILENCE_NAME;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Hands out one shared Unit per (name, filler). Owned by the caller and
 * passed to every dictionary that should share unit identity.
 */
export class UnitManager {
  private units: Map<string, Unit> = new Map();
  private nextId = 0;

  readonly silence: Unit;

  constructor() {
    this.silence = this.getUnit(SILENCE_NAME, true);
  }

  getUnit(name: string, filler: boolean, context: Context = EMPTY_CONTEXT): Unit {
    const key = `${filler ? 'F' : 'W'}:${name}`;
    let unit = this.units.get(key);
    if (!unit) {
      unit = new Unit(this.nextId++, name, filler, context);
      this.units.set(key, unit);
    }
    return unit;
  }

  get size(): number {
    return this.units.size;
  }
}
