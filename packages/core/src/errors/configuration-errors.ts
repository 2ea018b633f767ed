/**
 * Error codes shared by all errors raised from the configuration core.
 */
export enum ConfigurationErrorCode {
  INTERPOLATION_CYCLE = 'interpolation_cycle',
  INVALID_EXPRESSION = 'invalid_expression',
  CONVERSION_FAILED = 'conversion_failed',
  MISSING_PROPERTY = 'missing_property',
  UNSUPPORTED_OPERATION = 'unsupported_operation',
}

/**
 * Base class of the configuration errors; carries a machine-readable code.
 */
export class ConfigurationError extends Error {
  public readonly code: ConfigurationErrorCode;

  public constructor(message: string, code: ConfigurationErrorCode) {
    super(message);
    this.name = 'ConfigurationError';
    this.code = code;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
    };
  }
}

/**
 * Raised when a variable refers back to itself, directly or through a
 * chain of other variables. Fatal for the interpolate call that hit it.
 */
export class InterpolationCycleError extends ConfigurationError {
  public constructor(
    message: string,
    public readonly variable: string,
    public readonly chain: readonly string[],
  ) {
    super(message, ConfigurationErrorCode.INTERPOLATION_CYCLE);
    this.name = 'InterpolationCycleError';
    Object.setPrototypeOf(this, InterpolationCycleError.prototype);
  }

  public static infiniteLoop(
    source: string,
    chain: readonly string[],
  ): InterpolationCycleError {
    const variable = chain[chain.length - 1] ?? '';
    return new InterpolationCycleError(
      `Infinite loop in property interpolation of ${source}: ${chain.join('->')}`,
      variable,
      chain,
    );
  }

  public override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), variable: this.variable, chain: this.chain };
  }
}

/**
 * Raised for path expressions that cannot be parsed, and for keys that are
 * not valid for the requested operation.
 */
export class InvalidExpressionError extends ConfigurationError {
  public constructor(
    message: string,
    public readonly key: string,
  ) {
    super(message, ConfigurationErrorCode.INVALID_EXPRESSION);
    this.name = 'InvalidExpressionError';
    Object.setPrototypeOf(this, InvalidExpressionError.prototype);
  }

  public static malformed(key: string, reason: string): InvalidExpressionError {
    return new InvalidExpressionError(
      `Invalid key '${key}': ${reason}`,
      key,
    );
  }

  public override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), key: this.key };
  }
}

/**
 * Raised when a stored value cannot be converted to the requested type.
 */
export class ConversionError extends ConfigurationError {
  public constructor(
    message: string,
    public readonly targetType: string,
    public readonly value: unknown,
    public readonly key?: string,
  ) {
    super(message, ConfigurationErrorCode.CONVERSION_FAILED);
    this.name = 'ConversionError';
    Object.setPrototypeOf(this, ConversionError.prototype);
  }

  public static notConvertible(
    value: unknown,
    targetType: string,
  ): ConversionError {
    return new ConversionError(
      `Cannot convert value '${String(value)}' to ${targetType}`,
      targetType,
      value,
    );
  }

  /**
   * Returns a copy of this error that names the key the value was read from.
   */
  public forKey(key: string): ConversionError {
    return new ConversionError(
      `Key '${key}': cannot convert value '${String(this.value)}' to ${this.targetType}`,
      this.targetType,
      this.value,
      key,
    );
  }

  public override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      key: this.key,
      targetType: this.targetType,
      value: this.value,
    };
  }
}

/**
 * Raised by accessors for missing keys when the configuration is set to
 * throw instead of returning undefined.
 */
export class MissingPropertyError extends ConfigurationError {
  public constructor(public readonly key: string) {
    super(
      `Key '${key}' does not map to an existing object`,
      ConfigurationErrorCode.MISSING_PROPERTY,
    );
    this.name = 'MissingPropertyError';
    Object.setPrototypeOf(this, MissingPropertyError.prototype);
  }
}

/**
 * Raised by components asked for an operation they do not support.
 */
export class UnsupportedOperationError extends ConfigurationError {
  public constructor(message: string) {
    super(message, ConfigurationErrorCode.UNSUPPORTED_OPERATION);
    this.name = 'UnsupportedOperationError';
    Object.setPrototypeOf(this, UnsupportedOperationError.prototype);
  }
}
