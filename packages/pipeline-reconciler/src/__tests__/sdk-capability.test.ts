import { describe, it, expect, vi } from 'vitest';
import { createPipelineClient, loadTranscoderSdk } from '../pipeline-client.js';
import { InitializationError } from '../errors.js';
import { createSilentLogger } from '../logger.js';

// Simulate the SDK not being installed
vi.mock('@aws-sdk/client-elastic-transcoder', () => {
  throw new Error("Cannot find package '@aws-sdk/client-elastic-transcoder'");
});

describe('Transcoder SDK capability check', () => {
  it('raises MISSING_DEPENDENCY when the SDK cannot be loaded', async () => {
    const error = await loadTranscoderSdk().then(
      () => undefined,
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(InitializationError);
    if (error instanceof InitializationError) {
      expect(error.code).toBe('MISSING_DEPENDENCY');
      expect(error.message).toBe(
        '@aws-sdk/client-elastic-transcoder is required to manage transcoder pipelines',
      );
    }
  });

  it('fails before a client is built', async () => {
    await expect(
      createPipelineClient({ region: 'us-west-2', logLevel: 'info', logPretty: false }, createSilentLogger()),
    ).rejects.toThrow(InitializationError);
  });
});
