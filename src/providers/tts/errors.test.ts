import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  EmptyInputError,
  ProviderError,
  TextTooLongError,
  UnsupportedVoiceError,
  describeFailure,
} from './errors.js';

describe('describeFailure', () => {
  it('names the provider and the reason category', () => {
    const error = new ProviderError('Awarri API error: 500 - internal error', { status: 500 });

    expect(describeFailure('Awarri', error)).toBe(
      'Awarri generation failed (provider error): Awarri API error: 500 - internal error',
    );
  });

  it('distinguishes configuration problems', () => {
    expect(describeFailure('Spitch AI', new ConfigurationError('no key'))).toBe(
      'Spitch AI generation failed (configuration error): no key',
    );
  });
});

describe('input errors', () => {
  it('carry their kind and a readable message', () => {
    expect(new EmptyInputError().kind).toBe('empty-input');
    expect(new TextTooLongError(501, 500).message).toBe(
      'Text is 501 characters long; the limit is 500',
    );
    expect(new UnsupportedVoiceError('Bello', ['Hasan', 'Amina']).message).toBe(
      "Voice 'Bello' is not supported. Available voices: Hasan, Amina",
    );
  });
});
