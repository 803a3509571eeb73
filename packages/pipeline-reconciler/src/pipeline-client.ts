/**
 * Transcoder control-plane client.
 *
 * {@link PipelineClient} is the port the reconciler talks to;
 * {@link ElasticTranscoderPipelineClient} implements it on top of the
 * AWS SDK v3 Elastic Transcoder client.
 *
 * @module pipeline-client
 */

import type * as TranscoderSdkModule from '@aws-sdk/client-elastic-transcoder';
import type {
  ElasticTranscoderClient,
  Pipeline,
  Warning,
} from '@aws-sdk/client-elastic-transcoder';
import type { Logger } from 'pino';
import { TRANSCODER_SDK_PACKAGE } from './constants.js';
import { InitializationError, PipelineApiError } from './errors.js';
import type { PipelineOperation } from './errors.js';
import type { RuntimeConfig } from './config.js';
import { notificationsFromRemote, notificationsToRemote } from './notifications.js';
import type { CreatePipelineInput, PipelineRecord, UpdatePipelineInput } from './types.js';

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

/**
 * Remote pipeline operations. Every method rejects with a
 * {@link PipelineApiError} when the remote call fails.
 */
export interface PipelineClient {
  /** All pipelines, in the order the service lists them */
  listPipelines(): Promise<PipelineRecord[]>;
  /** Returns the created pipeline when the service echoes it back */
  createPipeline(input: CreatePipelineInput): Promise<PipelineRecord | undefined>;
  updatePipeline(input: UpdatePipelineInput): Promise<PipelineRecord | undefined>;
  deletePipeline(id: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// SDK loading
// ---------------------------------------------------------------------------

export type TranscoderSdk = typeof TranscoderSdkModule;

/**
 * Load the Elastic Transcoder SDK module.
 *
 * @throws InitializationError with code MISSING_DEPENDENCY when it cannot be loaded
 */
export async function loadTranscoderSdk(): Promise<TranscoderSdk> {
  try {
    return await import('@aws-sdk/client-elastic-transcoder');
  } catch (err) {
    throw new InitializationError(
      'MISSING_DEPENDENCY',
      `${TRANSCODER_SDK_PACKAGE} is required to manage transcoder pipelines`,
      { cause: err },
    );
  }
}

// ---------------------------------------------------------------------------
// Elastic Transcoder adapter
// ---------------------------------------------------------------------------

export interface TranscoderClientOptions {
  region: string;
  endpoint?: string;
  /** Transport attempts per call, SDK default when unset */
  maxAttempts?: number;
}

export class ElasticTranscoderPipelineClient implements PipelineClient {
  private readonly client: ElasticTranscoderClient;
  private readonly sdk: TranscoderSdk;
  private readonly logger: Logger;

  constructor(sdk: TranscoderSdk, options: TranscoderClientOptions, logger: Logger) {
    this.sdk = sdk;
    this.logger = logger.child({ component: 'transcoder-client' });

    this.client = new sdk.ElasticTranscoderClient({
      region: options.region,
      ...(options.endpoint ? { endpoint: options.endpoint } : {}),
      ...(options.maxAttempts ? { maxAttempts: options.maxAttempts } : {}),
    });
  }

  /**
   * List every pipeline, following NextPageToken until the last page.
   * Entries the service returns without an Id are skipped.
   */
  async listPipelines(): Promise<PipelineRecord[]> {
    const records: PipelineRecord[] = [];
    let pageToken: string | undefined;
    let pages = 0;

    do {
      const response = await this.call('list', () =>
        this.client.send(new this.sdk.ListPipelinesCommand({ PageToken: pageToken })),
      );
      pages++;

      for (const pipeline of response.Pipelines ?? []) {
        const record = toPipelineRecord(pipeline);
        if (record) {
          records.push(record);
        } else {
          this.logger.warn({ name: pipeline.Name }, 'Skipping listed pipeline without an Id');
        }
      }

      pageToken = response.NextPageToken;
    } while (pageToken);

    this.logger.debug({ pipelines: records.length, pages }, 'Listed pipelines');
    return records;
  }

  async createPipeline(input: CreatePipelineInput): Promise<PipelineRecord | undefined> {
    const response = await this.call('create', () =>
      this.client.send(
        new this.sdk.CreatePipelineCommand({
          Name: input.name,
          InputBucket: input.inputBucket,
          OutputBucket: input.outputBucket,
          Role: input.role,
          Notifications: notificationsToRemote(input.notifications),
        }),
      ),
    );
    this.logWarnings('create', response.Warnings);
    return response.Pipeline ? toPipelineRecord(response.Pipeline) : undefined;
  }

  async updatePipeline(input: UpdatePipelineInput): Promise<PipelineRecord | undefined> {
    const response = await this.call('update', () =>
      this.client.send(
        new this.sdk.UpdatePipelineCommand({
          Id: input.id,
          Name: input.name,
          InputBucket: input.inputBucket,
          Role: input.role,
          Notifications: notificationsToRemote(input.notifications),
        }),
      ),
    );
    this.logWarnings('update', response.Warnings);
    return response.Pipeline ? toPipelineRecord(response.Pipeline) : undefined;
  }

  async deletePipeline(id: string): Promise<void> {
    await this.call('delete', () => this.client.send(new this.sdk.DeletePipelineCommand({ Id: id })));
  }

  // ─── Private helpers ───────────────────────────────────────────────

  private async call<T>(operation: PipelineOperation, send: () => Promise<T>): Promise<T> {
    try {
      return await send();
    } catch (err) {
      const apiError = PipelineApiError.from(operation, err);
      this.logger.error(
        { operation, code: apiError.code, statusCode: apiError.statusCode, error: apiError.message },
        'Transcoder API call failed',
      );
      throw apiError;
    }
  }

  private logWarnings(operation: PipelineOperation, warnings: Warning[] | undefined): void {
    for (const warning of warnings ?? []) {
      this.logger.warn({ operation, code: warning.Code }, warning.Message ?? 'Transcoder API warning');
    }
  }
}

/**
 * Map an SDK pipeline to a record. Returns undefined without an Id.
 */
export function toPipelineRecord(pipeline: Pipeline): PipelineRecord | undefined {
  if (!pipeline.Id) {
    return undefined;
  }
  return {
    id: pipeline.Id,
    arn: pipeline.Arn,
    name: pipeline.Name ?? '',
    status: pipeline.Status,
    role: pipeline.Role ?? '',
    inputBucket: pipeline.InputBucket ?? '',
    outputBucket: pipeline.OutputBucket ?? pipeline.ContentConfig?.Bucket ?? '',
    notifications: notificationsFromRemote(pipeline.Notifications),
  };
}

/**
 * Check that the SDK is available, then build a client for the configured
 * region and endpoint.
 */
export async function createPipelineClient(config: RuntimeConfig, logger: Logger): Promise<PipelineClient> {
  const sdk = await loadTranscoderSdk();
  return new ElasticTranscoderPipelineClient(
    sdk,
    { region: config.region, endpoint: config.endpoint, maxAttempts: config.maxAttempts },
    logger,
  );
}
