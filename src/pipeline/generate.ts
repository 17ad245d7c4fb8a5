import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { StalenessTracker } from '../staleness/tracker.js';
import type { SidecarSynchronizer } from '../sidecar/synchronizer.js';
import type { ParserRegistry } from '../parser/registry.js';
import type { DescriptionGenerator } from '../generator/generator.js';
import { mockDescription } from '../generator/mock.js';
import type { ParsedEntity } from '../model/entity.js';
import type { Scope } from '../model/scope.js';
import { modelForScope, type LodkeepConfig } from '../config.js';
import { ConcurrentInvalidationError, describeCause } from '../errors.js';
import { forEachAsync } from '../utils/pool.js';
import { createLogger } from '../utils/logger.js';

const debug = createLogger('pipeline');

export interface PipelineDeps {
  root: string;
  config: LodkeepConfig;
  registry: ParserRegistry;
  tracker: StalenessTracker;
  synchronizer: SidecarSynchronizer;
  generator: DescriptionGenerator;
}

export interface GenerateRequest {
  /** Project-relative source files. */
  files: string[];
  /** Regenerate entities that are already fresh. */
  force?: boolean;
  /** Only generate for entities of this scope; others are still classified and adopted. */
  scope?: Scope;
  /** Extra text passed to the generator with every entity. */
  context?: string;
  signal?: AbortSignal;
  onEntity?: (event: EntityEvent) => void;
}

export type EntityOutcome = 'generated' | 'skipped' | 'failed' | 'placeholder' | 'conflict';

export interface EntityEvent {
  entity: ParsedEntity;
  outcome: EntityOutcome;
}

export interface GenerationFailure {
  path: string;
  scope?: Scope;
  name?: string;
  message: string;
}

export interface GenerateSummary {
  files: number;
  entities: number;
  generated: number;
  skipped: number;
  failed: number;
  /** Failures recorded with placeholder text (placeholderOnFailure). */
  placeholders: number;
  /** Generations discarded because the record was invalidated meanwhile. */
  conflicts: number;
  sidecarsWritten: number;
  aborted: boolean;
  errors: GenerationFailure[];
}

interface Job {
  entity: ParsedEntity;
  /** Record revision when the job was planned. */
  revision: number | null;
}

/**
 * Brings descriptions for `files` up to date: fresh entities are adopted,
 * everything else is generated through a bounded pool and recorded as soon as
 * it returns. One failure never blocks the rest. Sidecars of every parsed file
 * are reconciled at the end, including after an abort.
 */
export async function generateDescriptions(deps: PipelineDeps, request: GenerateRequest): Promise<GenerateSummary> {
  const { tracker, generator, config } = deps;
  const summary: GenerateSummary = {
    files: 0,
    entities: 0,
    generated: 0,
    skipped: 0,
    failed: 0,
    placeholders: 0,
    conflicts: 0,
    sidecarsWritten: 0,
    aborted: false,
    errors: [],
  };

  const parsed = new Map<string, ParsedEntity[]>();
  const jobs: Job[] = [];
  const emit = (entity: ParsedEntity, outcome: EntityOutcome) => request.onEntity?.({ entity, outcome });

  for (const file of request.files) {
    let entities: ParsedEntity[];
    try {
      entities = deps.registry.parseFile(readFileSync(join(deps.root, file), 'utf-8'), file);
    } catch (err) {
      summary.errors.push({ path: file, message: `could not read or parse: ${describeCause(err)}` });
      continue;
    }

    summary.files++;
    parsed.set(file, entities);

    for (const entity of entities) {
      summary.entities++;
      const result = tracker.check(entity, entity.fingerprint);
      const wanted = !request.scope || request.scope === entity.scope;

      if (result.status === 'fresh' && (!request.force || !wanted)) {
        tracker.adopt(entity, result);
        summary.skipped++;
        emit(entity, 'skipped');
      } else if (wanted) {
        jobs.push({ entity, revision: tracker.revisionOf(entity.fingerprint) });
      }
    }
  }

  debug('%d entities in %d files, %d to generate', summary.entities, summary.files, jobs.length);

  await forEachAsync(
    jobs,
    config.maxParallelism,
    async ({ entity, revision }) => {
      let description: string;
      let outcome: EntityOutcome = 'generated';

      try {
        description = await generator.generate(entity, {
          model: modelForScope(config, generator.provider, entity.scope),
          context: request.context,
          signal: request.signal,
        });
      } catch (err) {
        if (request.signal?.aborted) return;
        summary.failed++;
        summary.errors.push({ path: entity.filePath, scope: entity.scope, name: entity.name, message: describeCause(err) });
        if (!config.placeholderOnFailure) {
          emit(entity, 'failed');
          return;
        }
        description = mockDescription(entity);
        outcome = 'placeholder';
      }

      try {
        tracker.recordGenerated(entity, entity.fingerprint, description, { expectedRevision: revision });
      } catch (err) {
        if (!(err instanceof ConcurrentInvalidationError)) throw err;
        debug('discarding description for %s: %s', entity.name, err.message);
        summary.conflicts++;
        emit(entity, 'conflict');
        return;
      }

      if (outcome === 'placeholder') summary.placeholders++;
      else summary.generated++;
      emit(entity, outcome);
    },
    request.signal,
  );

  summary.aborted = request.signal?.aborted ?? false;

  for (const [file, entities] of parsed) {
    if (deps.synchronizer.reconcile(file, entities).written) summary.sidecarsWritten++;
  }

  return summary;
}
