/**
 * @tracewright/tracing - Carriers
 * Uniform get/set/keys access over transport header containers
 */

// ============================================================================
// CARRIER
// ============================================================================

/**
 * Text key/value view of a transport's headers.
 * `get` answers an empty string for a missing key.
 */
export interface Carrier {
  get(key: string): string;
  set(key: string, value: string): void;
  keys(): string[];
}

/**
 * How one container type answers reads and writes.
 * `set` owns the container's duplicate-key rules.
 */
export interface HeaderStrategy<C> {
  get(container: C, key: string): string | undefined;
  set(container: C, key: string, value: string): void;
  keys(container: C): string[];
}

/**
 * A carrier over a mutable container, with the container's rules supplied by a strategy.
 * Bound to a single message or request.
 */
export class HeaderCarrier<C> implements Carrier {
  constructor(
    readonly container: C,
    private readonly strategy: HeaderStrategy<C>
  ) {}

  get(key: string): string {
    return this.strategy.get(this.container, key) ?? "";
  }

  set(key: string, value: string): void {
    this.strategy.set(this.container, key, value);
  }

  keys(): string[] {
    return this.strategy.keys(this.container);
  }
}

// ============================================================================
// PLAIN MAP
// ============================================================================

/** Exact-key string map; `set` overwrites */
export const recordStrategy: HeaderStrategy<Record<string, string>> = {
  get: (record, key) => (Object.hasOwn(record, key) ? record[key] : undefined),
  set: (record, key, value) => {
    record[key] = value;
  },
  keys: (record) => Object.keys(record),
};

/**
 * Carrier over a plain string record.
 *
 * @example
 * ```typescript
 * const carrier = new MapCarrier();
 * propagate(trace.getContext(), carrier);
 * await queue.send({ body, headers: carrier.container });
 * ```
 */
export class MapCarrier extends HeaderCarrier<Record<string, string>> {
  constructor(values: Record<string, string> = {}) {
    super(values, recordStrategy);
  }
}
