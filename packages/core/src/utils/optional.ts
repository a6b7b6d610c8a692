/**
 * Fluent builder for objects whose optional keys must be absent, not
 * `undefined`, when unset.
 */
export interface OptionalBuilder<T extends object> {
  /** Add properties when a condition is true. */
  when<K extends keyof T>(condition: boolean, props: Pick<Required<T>, K>): OptionalBuilder<T>;

  /** Add a property if its value is defined. */
  ifDefined<K extends keyof T>(key: K, value: T[K] | undefined): OptionalBuilder<T>;

  build(): T;
}

/**
 * @example
 * ```typescript
 * const init = setOptional<RequestInit>({ method: 'GET', headers })
 *   .ifDefined('signal', options.signal)
 *   .build();
 * ```
 */
export function setOptional<T extends object>(base: T): OptionalBuilder<T> {
  let result = { ...base };

  const builder: OptionalBuilder<T> = {
    when(condition, props) {
      if (condition) {
        result = { ...result, ...props };
      }
      return builder;
    },

    ifDefined(key, value) {
      if (value !== undefined) {
        result = { ...result, [key]: value };
      }
      return builder;
    },

    build() {
      return result;
    }
  };

  return builder;
}

/**
 * Collect positive numeric filters as query parameters, skipping zero,
 * negative and unset values (the server treats those as "no filter").
 */
export function positiveParams(
  params: Record<string, number | undefined>
): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && Number.isFinite(value) && value > 0) {
      entries.push([key, String(value)]);
    }
  }
  return entries;
}
