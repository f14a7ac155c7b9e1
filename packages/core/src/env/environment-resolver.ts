import type { EnvVarPatternResolverConfig } from '@multi-oauth/models';

/**
 * Raised when a `${VAR}` pattern cannot be resolved.
 * @public
 */
export class EnvironmentResolutionError extends Error {
  public constructor(
    message: string,
    public readonly variable?: string,
  ) {
    super(message);
    this.name = 'EnvironmentResolutionError';
    Object.setPrototypeOf(this, EnvironmentResolutionError.prototype);
  }

  public static missingVariable(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Required environment variable '${variable}' is not defined`,
      variable,
    );
  }

  public static circularReference(variable: string): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Circular reference detected in environment variable '${variable}'`,
      variable,
    );
  }

  public static maxDepthExceeded(depth: number): EnvironmentResolutionError {
    return new EnvironmentResolutionError(`Maximum resolution depth of ${depth} exceeded`);
  }
}

const PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::([^}]*))?\}/g;

/**
 * Expands `${NAME}` and `${NAME:default}` in service configuration values.
 *
 * Variable names are upper-case identifiers. Values and defaults are
 * expanded recursively up to `maxDepth` levels; a variable that refers back
 * to itself is rejected. In strict mode (the default) an undefined variable
 * without a default is an error, otherwise the pattern is left untouched.
 *
 * @example
 * ```typescript
 * const resolver = new EnvVarPatternResolver({ envSource: { SHOP: 'demo' } });
 * resolver.resolve('https://${SHOP}.myshopify.com'); // 'https://demo.myshopify.com'
 * ```
 * @public
 */
export class EnvVarPatternResolver {
  private readonly maxDepth: number;
  private readonly strict: boolean;
  private readonly envSource: Record<string, string | undefined>;

  public constructor(config: EnvVarPatternResolverConfig = {}) {
    this.maxDepth = config.maxDepth ?? 10;
    this.strict = config.strict ?? true;
    this.envSource = config.envSource ?? process.env;
  }

  /**
   * @throws {EnvironmentResolutionError} on a missing variable (strict mode),
   * a circular reference or when nesting exceeds `maxDepth`
   */
  public resolve(value: string): string {
    return this.expand(value, new Set(), 0);
  }

  public static containsPattern(value: string): boolean {
    return new RegExp(PATTERN.source).test(value);
  }

  private expand(value: string, visited: ReadonlySet<string>, depth: number): string {
    if (depth > this.maxDepth) {
      throw EnvironmentResolutionError.maxDepthExceeded(this.maxDepth);
    }

    return value.replace(
      new RegExp(PATTERN.source, 'g'),
      (match: string, name: string, fallback: string | undefined) => {
        if (visited.has(name)) {
          throw EnvironmentResolutionError.circularReference(name);
        }

        const next = new Set(visited).add(name);
        const envValue = this.envSource[name];
        if (envValue !== undefined) {
          return this.expand(envValue, next, depth + 1);
        }
        if (fallback !== undefined) {
          return this.expand(fallback, next, depth + 1);
        }
        if (this.strict) {
          throw EnvironmentResolutionError.missingVariable(name);
        }
        return match;
      },
    );
  }
}

/**
 * One-shot helper around {@link EnvVarPatternResolver}.
 * @public
 */
export function resolveEnvVar(
  value: string,
  envSource: Record<string, string | undefined> = process.env,
): string {
  return new EnvVarPatternResolver({ envSource }).resolve(value);
}
