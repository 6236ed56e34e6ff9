export type ErrorKind =
  | 'empty-input'
  | 'text-too-long'
  | 'unsupported-voice'
  | 'configuration'
  | 'transport'
  | 'provider';

/**
 * Base class for every failure a synthesis request can end in.
 * `kind` lets callers render a specific message without instanceof chains.
 */
export abstract class SynthesisError extends Error {
  abstract readonly kind: ErrorKind;
}

/**
 * Text is empty or whitespace only
 */
export class EmptyInputError extends SynthesisError {
  readonly kind = 'empty-input';

  constructor(message = 'Please enter text before generating') {
    super(message);
    this.name = 'EmptyInputError';
  }
}

export class TextTooLongError extends SynthesisError {
  readonly kind = 'text-too-long';

  constructor(
    readonly length: number,
    readonly maxLength: number,
  ) {
    super(`Text is ${length} characters long; the limit is ${maxLength}`);
    this.name = 'TextTooLongError';
  }
}

export class UnsupportedVoiceError extends SynthesisError {
  readonly kind = 'unsupported-voice';

  constructor(voice: string | null, available: readonly string[]) {
    super(
      voice === null
        ? `A voice is required. Available voices: ${available.join(', ')}`
        : `Voice '${voice}' is not supported. Available voices: ${available.join(', ')}`,
    );
    this.name = 'UnsupportedVoiceError';
  }
}

/**
 * Missing or invalid credentials or endpoint. Not retryable until the
 * configuration is fixed.
 */
export class ConfigurationError extends SynthesisError {
  readonly kind = 'configuration';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Network-level failure, including transport timeouts
 */
export class TransportError extends SynthesisError {
  readonly kind = 'transport';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * The provider answered, but rejected the request or returned a body of
 * unexpected shape.
 */
export class ProviderError extends SynthesisError {
  readonly kind = 'provider';
  readonly status: number | undefined;
  readonly body: string | undefined;

  constructor(message: string, details: { status?: number; body?: string } = {}) {
    super(message);
    this.name = 'ProviderError';
    this.status = details.status;
    this.body = details.body;
  }
}

const KIND_LABELS: Record<ErrorKind, string> = {
  'empty-input': 'empty input',
  'text-too-long': 'text too long',
  'unsupported-voice': 'unsupported voice',
  configuration: 'configuration error',
  transport: 'network error',
  provider: 'provider error',
};

/**
 * Message shown to the user: provider, reason category, then the detail.
 */
export function describeFailure(providerLabel: string, error: SynthesisError): string {
  return `${providerLabel} generation failed (${KIND_LABELS[error.kind]}): ${error.message}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
