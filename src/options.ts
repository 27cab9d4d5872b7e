import type { TypeCache } from "./converter/type-cache";
import type { Logger } from "./logger";
import type { ScalarRegistry } from "./scalars/registry";

export interface ConverterOptions {
  /** pino logger; conversions are recorded at `debug` and `trace` level. */
  readonly logger?: Logger;
  readonly scalarRegistry?: ScalarRegistry;
  /**
   * Cache to register concrete types in. Pass the same cache to several
   * builds to make them share type instances.
   */
  readonly cache?: TypeCache;
}
