/**
 * Versioned Mutation Pipeline
 *
 * Runs an ordered list of update steps against one remote resource. Every
 * update carries the version returned by the previous response; the platform
 * rejects a stale one. Steps never overlap and the first failure ends the run.
 */

import { z } from 'zod';
import type { UpdateRequest, Versioned } from '../api/types.js';
import { ExtractionError, PipelineStepError, ResponseCheckError } from '../errors.js';
import type { ArtifactSink } from './artifacts.js';
import { ReferenceSet, type ReferenceReader } from './references.js';

export type PipelineStatus = 'idle' | 'running' | 'completed' | 'aborted';

export interface VersionHandle {
  readonly resourceId: string;
  readonly version: number;
}

/** References read from a response; `undefined` means the field was absent */
export type Extracted = Record<string, string | undefined>;

interface ResponseHooks<R> {
  /** Snapshot name for the response */
  responseArtifact?: string;
  extract?(resource: R): Extracted;
  /** Returns a message when the response does not look as expected */
  check?(resource: R): string | undefined;
}

/**
 * First step: produces the resource the rest of the pipeline mutates, either
 * by creating it or by handing over the result of an earlier run
 */
export interface PipelineOrigin<R extends Versioned> extends ResponseHooks<R> {
  name: string;
  start(): Promise<R>;
}

export interface MutationStep<R extends Versioned, A> extends ResponseHooks<R> {
  name: string;
  /** Snapshot name for the rendered request body */
  requestArtifact?: string;
  actions(refs: ReferenceReader): A[];
  /** References naming objects this step deletes */
  release?: string[];
}

export type UpdateFn<R, A> = (resourceId: string, update: UpdateRequest<A>) => Promise<R>;

export interface StepEvent<R> {
  index: number;
  name: string;
  handle: VersionHandle;
  resource: R;
}

export interface PipelineOptions<R> {
  sink?: ArtifactSink;
  /** Projection applied to responses before they are recorded */
  snapshot?: (resource: R) => unknown;
  onStep?: (event: StepEvent<R>) => void;
}

export interface StepRecord<A> {
  index: number;
  name: string;
  version: number;
  request?: UpdateRequest<A>;
}

export interface PipelineResult<R, A> {
  resource: R;
  handle: VersionHandle;
  references: Record<string, string>;
  steps: StepRecord<A>[];
}

const VersionHandleSchema = z.object({
  id: z.string().min(1),
  version: z.number().int().nonnegative(),
});

export class VersionedPipeline<R extends Versioned, A> {
  private state: PipelineStatus = 'idle';

  constructor(
    private readonly update: UpdateFn<R, A>,
    private readonly options: PipelineOptions<R> = {}
  ) {}

  get status(): PipelineStatus {
    return this.state;
  }

  async run(origin: PipelineOrigin<R>, steps: MutationStep<R, A>[]): Promise<PipelineResult<R, A>> {
    if (this.state === 'running') {
      throw new Error('Pipeline is already running');
    }
    this.state = 'running';

    const refs = new ReferenceSet();
    const history: StepRecord<A>[] = [];
    let current = { index: 0, name: origin.name };

    try {
      let resource = await origin.start();
      let handle = this.readHandle(resource, null);
      await this.afterResponse(origin, resource, refs);
      history.push({ index: 0, name: origin.name, version: handle.version });
      this.options.onStep?.({ index: 0, name: origin.name, handle, resource });

      for (const [offset, step] of steps.entries()) {
        current = { index: offset + 1, name: step.name };

        const request: UpdateRequest<A> = { version: handle.version, actions: step.actions(refs) };
        await this.record(step.requestArtifact, request);

        resource = await this.update(handle.resourceId, request);
        handle = this.readHandle(resource, handle);

        for (const name of step.release ?? []) {
          refs.release(name);
        }
        await this.afterResponse(step, resource, refs);

        history.push({ ...current, version: handle.version, request });
        this.options.onStep?.({ ...current, handle, resource });
      }

      this.state = 'completed';
      return { resource, handle, references: refs.toJSON(), steps: history };
    } catch (error) {
      this.state = 'aborted';
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new PipelineStepError(current.name, current.index, cause);
    }
  }

  /**
   * Validate id and version of a response against the previous handle
   */
  private readHandle(resource: R, previous: VersionHandle | null): VersionHandle {
    const parsed = VersionHandleSchema.safeParse(resource);
    if (!parsed.success) {
      const field = String(parsed.error.issues[0]?.path[0] ?? 'version');
      throw new ExtractionError(`Response has no valid "${field}"`, field);
    }

    const { id, version } = parsed.data;
    if (previous) {
      if (id !== previous.resourceId) {
        throw new ExtractionError(`Response is for resource ${id}, expected ${previous.resourceId}`, 'id');
      }
      if (version < previous.version) {
        throw new ExtractionError(
          `Version went backwards from ${previous.version} to ${version}`,
          'version'
        );
      }
    }

    return { resourceId: id, version };
  }

  private async afterResponse(hooks: ResponseHooks<R>, resource: R, refs: ReferenceSet): Promise<void> {
    const snapshot = this.options.snapshot ? this.options.snapshot(resource) : resource;
    await this.record(hooks.responseArtifact, snapshot);

    for (const [name, value] of Object.entries(hooks.extract?.(resource) ?? {})) {
      if (value === undefined || value === '') {
        throw new ExtractionError(`Response has no value for reference "${name}"`, name);
      }
      refs.set(name, value);
    }

    const problem = hooks.check?.(resource);
    if (problem !== undefined) {
      throw new ResponseCheckError(problem);
    }
  }

  /**
   * Artifacts are observational; a failed write is reported and the run goes on
   */
  private async record(name: string | undefined, body: unknown): Promise<void> {
    if (!name || !this.options.sink) {
      return;
    }
    try {
      await this.options.sink.record(name, body);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`⚠ Could not record artifact "${name}": ${message}`);
    }
  }
}
