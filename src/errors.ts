export type ProxyErrorKind = 'configuration' | 'rewrite' | 'modifier' | 'transport' | 'internal';

/**
 * Base of every error the proxy raises. `kind` lets error hooks switch on the
 * failure without `instanceof` chains.
 */
export abstract class ProxyError extends Error {
  abstract readonly kind: ProxyErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid origin, route pattern or setting. Raised at setup, never per request. */
export class ConfigurationError extends ProxyError {
  readonly kind = 'configuration';
}

export class RewriteError extends ProxyError {
  readonly kind = 'rewrite';

  constructor(
    message: string,
    readonly target: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ModifierError extends ProxyError {
  readonly kind = 'modifier';

  constructor(
    message: string,
    readonly stage: 'global' | 'route',
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Origin unreachable, connection reset or request timed out. */
export class TransportError extends ProxyError {
  readonly kind = 'transport';
}

/** Anything thrown during dispatch that is not one of the above. */
export class InternalFault extends ProxyError {
  readonly kind = 'internal';
}

function describe(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function toProxyError(value: unknown): ProxyError {
  if (value instanceof ProxyError) return value;
  return new InternalFault(describe(value), { cause: value });
}

export function toTransportError(value: unknown): ProxyError {
  if (value instanceof ProxyError) return value;
  return new TransportError(`Origin request failed: ${describe(value)}`, { cause: value });
}

export function toModifierError(value: unknown, stage: 'global' | 'route'): ModifierError {
  if (value instanceof ModifierError) return value;
  return new ModifierError(describe(value), stage, { cause: value });
}
