export class ConfigurationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigurationError'
  }
}

export class InvalidAddressError extends Error {
  constructor(
    readonly input: unknown,
    message = 'Invalid IP address'
  ) {
    super(message)
    this.name = 'InvalidAddressError'
  }
}

/**
 * Raised by a geolocation provider when an attempt fails before the provider could give an answer.
 * `retryable` decides whether the resolver tries the same provider again.
 */
export class GeoProviderError extends Error {
  constructor(
    message: string,
    readonly retryable: boolean,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'GeoProviderError'
  }
}
