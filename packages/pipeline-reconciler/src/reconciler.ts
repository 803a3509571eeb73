import type { Logger } from 'pino';
import { ReconcileError } from './errors.js';
import { PipelineFingerprint } from './fingerprint.js';
import type { PipelineClient } from './pipeline-client.js';
import type {
  AbsentPipelineState,
  DesiredPipelineState,
  PipelineRecord,
  PresentPipelineState,
  ReconcilePlan,
  ReconcileResult,
} from './types.js';

/**
 * Converges one transcoder pipeline, looked up by name, to a desired state.
 *
 * Each run re-reads the remote state and issues at most one mutating call.
 * Remote failures propagate unchanged; nothing is retried or rolled back.
 */
export class PipelineReconciler {
  private readonly client: PipelineClient;
  private readonly logger: Logger;

  constructor(client: PipelineClient, logger: Logger) {
    this.client = client;
    this.logger = logger.child({ component: 'pipeline-reconciler' });
  }

  /**
   * First pipeline whose name matches exactly, in list order.
   *
   * Names are not unique remotely. When several match, the first listed
   * one wins and a warning is logged.
   */
  async find(name: string): Promise<PipelineRecord | undefined> {
    const pipelines = await this.client.listPipelines();
    const matches = pipelines.filter((pipeline) => pipeline.name === name);

    if (matches.length > 1) {
      this.logger.warn(
        { name, ids: matches.map((m) => m.id) },
        'Multiple pipelines share this name, using the first listed',
      );
    }

    return matches[0];
  }

  /** Work out what {@link reconcile} would do, without changing anything */
  async plan(desired: DesiredPipelineState): Promise<ReconcilePlan> {
    const existing = await this.find(desired.name);
    return this.planAgainst(desired, existing);
  }

  async reconcile(desired: DesiredPipelineState): Promise<ReconcileResult> {
    return desired.state === 'present'
      ? this.convergePresent(desired)
      : this.convergeAbsent(desired);
  }

  /**
   * Create the pipeline if missing, update it if the compared fields
   * drifted, otherwise leave it alone.
   */
  async convergePresent(desired: PresentPipelineState): Promise<ReconcileResult> {
    const existing = await this.find(desired.name);
    const plan = this.planAgainst(desired, existing);

    if (!existing) {
      this.logger.info(
        { name: desired.name, inputBucket: desired.inputBucket, outputBucket: desired.outputBucket },
        'Creating pipeline',
      );
      const created = await this.client.createPipeline({
        name: desired.name,
        inputBucket: desired.inputBucket,
        outputBucket: desired.outputBucket,
        role: desired.role,
        notifications: desired.notifications,
      });

      // The id comes from a fresh lookup; the create response is the fallback.
      const refetched = await this.find(desired.name);
      const id = refetched?.id ?? created?.id;
      if (!id) {
        throw new ReconcileError(`Pipeline "${desired.name}" was created but could not be found afterwards`);
      }

      this.logger.info({ name: desired.name, id }, 'Pipeline created');
      return { changed: true, action: 'create', name: refetched?.name ?? desired.name, id };
    }

    if (plan.action === 'none') {
      this.logger.info({ name: existing.name, id: existing.id }, 'Pipeline is up to date');
      return { changed: false, action: 'none', name: existing.name, id: existing.id };
    }

    this.logger.info(
      { name: desired.name, id: existing.id, differingFields: plan.differingFields },
      'Updating pipeline',
    );
    await this.client.updatePipeline({
      id: existing.id,
      name: desired.name,
      inputBucket: desired.inputBucket,
      role: desired.role,
      notifications: desired.notifications,
    });

    this.logger.info({ name: desired.name, id: existing.id }, 'Pipeline updated');
    return { changed: true, action: 'update', name: existing.name, id: existing.id };
  }

  /** Delete the pipeline if it exists */
  async convergeAbsent(desired: AbsentPipelineState): Promise<ReconcileResult> {
    const existing = await this.find(desired.name);

    if (!existing) {
      this.logger.info({ name: desired.name }, 'Pipeline already absent');
      return { changed: false, action: 'none', name: desired.name };
    }

    this.logger.info({ name: existing.name, id: existing.id }, 'Deleting pipeline');
    await this.client.deletePipeline(existing.id);

    this.logger.info({ name: existing.name, id: existing.id }, 'Pipeline deleted');
    return { changed: true, action: 'delete', name: existing.name, id: existing.id };
  }

  private planAgainst(desired: DesiredPipelineState, existing: PipelineRecord | undefined): ReconcilePlan {
    if (desired.state === 'absent') {
      return existing
        ? { action: 'delete', name: desired.name, existing, differingFields: [] }
        : { action: 'none', name: desired.name, differingFields: [] };
    }

    if (!existing) {
      return { action: 'create', name: desired.name, differingFields: [] };
    }

    const current = PipelineFingerprint.fromRecord(existing);
    const wanted = PipelineFingerprint.fromDesired(desired);
    if (current.equals(wanted)) {
      return { action: 'none', name: desired.name, existing, differingFields: [] };
    }
    return { action: 'update', name: desired.name, existing, differingFields: current.differingFields(wanted) };
  }
}
