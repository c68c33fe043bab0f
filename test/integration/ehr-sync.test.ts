/**
 * Integration tests for the EHR sync engine
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as E from 'fp-ts/Either';
import { firstValueFrom } from 'rxjs';
import { filter, toArray } from 'rxjs/operators';
import { createEhrSyncEngine } from '../../src/engine';
import type { EhrSyncEngine } from '../../src/engine';
import { defaultEngineConfig } from '../../src/config/defaults';
import { createMemoryExtractionAdapter } from '../../src/adapters/extraction';
import type { MemoryExtractionAdapter } from '../../src/adapters/extraction';
import { createMemoryTargetStore } from '../../src/adapters/target-store';
import type { MemoryTargetStore } from '../../src/adapters/target-store';
import { createMemoryReviewQueue } from '../../src/adapters/review-queue';
import type { MemoryReviewQueue } from '../../src/adapters/review-queue';
import { createMemorySamplingSource } from '../../src/adapters/sampling';
import { createSyncLedger } from '../../src/core/sync-ledger';
import type { SyncLedger } from '../../src/core/sync-ledger';
import type {
  DataConflict,
  DataRecord,
  EngineConfig,
  SchemaMappingInput,
  SynchronizationData,
  SynchronizationResult,
} from '../../src/types';
import { transientIOError } from '../../src/types/errors';

const at = (hours: number, minutes = 0): number => Date.UTC(2024, 4, 20, hours, minutes);
const NOW = at(12);

const patientMapping: SchemaMappingInput = {
  sourceSystem: 'cerner',
  targetSystem: 'registry',
  resourceType: 'Patient',
  fieldMappings: [
    { sourceField: 'name.family', targetField: 'familyName', sourceType: 'string', targetType: 'string', required: true },
    { sourceField: 'birthDate', targetField: 'birthDate', sourceType: 'date', targetType: 'date', required: false },
    {
      sourceField: 'allergies',
      targetField: 'allergies',
      sourceType: 'list',
      targetType: 'list',
      required: false,
      clinicallySignificant: true,
      merge: 'union',
    },
    {
      sourceField: 'phone',
      targetField: 'phone',
      sourceType: 'string',
      targetType: 'string',
      required: false,
      importance: 'low',
    },
  ],
};

const config: EngineConfig = {
  ...defaultEngineConfig,
  mappings: [patientMapping],
  retryPolicy: { maxRetries: 2, baseDelay: 1, backoffMultiplier: 2, maxDelay: 4 },
  batchSize: 5,
};

const patient = (resourceId: string, fields: DataRecord['fields'], updatedAt: number): DataRecord => ({
  resourceType: 'Patient',
  resourceId,
  sourceSystem: 'cerner',
  fields,
  updatedAt,
});

const request: SynchronizationData = {
  providerId: 'clinic-7',
  ehrSystem: 'cerner',
  targetSystem: 'registry',
  syncType: 'full',
  resourceTypes: ['Patient'],
};

describe('EHR Sync Integration Tests', () => {
  let extraction: MemoryExtractionAdapter;
  let target: MemoryTargetStore;
  let reviewQueue: MemoryReviewQueue;
  let ledger: SyncLedger;
  let engine: EhrSyncEngine;

  const build = (engineConfig: EngineConfig = config): EhrSyncEngine => {
    const created = createEhrSyncEngine(
      {
        extraction,
        target,
        reviewQueue,
        ledger,
        sampling: createMemorySamplingSource([]),
        now: () => NOW,
      },
      engineConfig,
    );
    if (E.isLeft(created)) {
      throw new Error(created.left.message);
    }
    return created.right;
  };

  const sync = async (data: SynchronizationData = request): Promise<SynchronizationResult> => {
    const result = await engine.startSync(data)();
    if (E.isLeft(result)) {
      throw new Error(result.left.message);
    }
    return result.right;
  };

  beforeEach(() => {
    extraction = createMemoryExtractionAdapter();
    target = createMemoryTargetStore([], () => NOW);
    reviewQueue = createMemoryReviewQueue();
    ledger = createSyncLedger();
    engine = build();
  });

  afterEach(() => {
    engine.dispose();
    reviewQueue.close();
  });

  describe('End-to-End Sync Scenarios', () => {
    it('should transform nested source fields and load the target', async () => {
      extraction.put(
        patient('pat-1', { name: { family: 'Okafor' }, birthDate: '1984-03-09T00:00:00Z', phone: 5550100 }, at(9)),
      );

      const result = await sync();

      expect(result.success).toBe(true);
      expect(result.recordsCreated).toBe(1);
      expect(target.records()[0]?.fields).toEqual({
        familyName: 'Okafor',
        birthDate: '1984-03-09',
        phone: '5550100',
      });
    });

    it('should merge a mergeable list edited on both sides', async () => {
      engine.dispose();
      engine = build({ ...config, defaultStrategy: { name: 'merge', rules: [] } });

      target.put({
        ...patient('pat-1', { familyName: 'Okafor', allergies: ['latex', 'penicillin'] }, at(10)),
        mappingVersion: 1,
      });
      await ledger.recordApplied('Patient', 'pat-1', { lastSyncAt: at(8), checksum: 'previous' })();
      extraction.put(patient('pat-1', { name: { family: 'Okafor' }, allergies: ['latex', 'sulfa'] }, at(11)));

      const result = await sync();

      expect(result.recordsUpdated).toBe(1);
      expect(result.conflicts.map((c) => [c.field, c.severity])).toEqual([['allergies', 'critical']]);
      expect(result.resolutions).toEqual([
        expect.objectContaining({
          field: 'allergies',
          strategyApplied: 'merge',
          finalValue: ['latex', 'penicillin', 'sulfa'],
          justification: 'merged with union',
        }),
      ]);
      expect(target.records()[0]?.fields).toEqual({
        familyName: 'Okafor',
        allergies: ['latex', 'penicillin', 'sulfa'],
      });
    });

    it('should leave a resource untouched while it waits for review and apply the decision', async () => {
      engine.dispose();
      engine = build({ ...config, defaultStrategy: { name: 'manual', rules: [] } });

      target.put({ ...patient('pat-2', { familyName: 'Lind', phone: '5550111' }, at(10)), mappingVersion: 1 });
      await ledger.recordApplied('Patient', 'pat-2', { lastSyncAt: at(8), checksum: 'previous' })();
      extraction.put(patient('pat-2', { name: { family: 'Lind-Berg' }, phone: '5550111' }, at(9)));

      const result = await sync();

      expect(result.status).toBe('completed');
      expect(result.success).toBe(true);
      expect(result.recordsPending).toBe(1);
      expect(result.pendingResourceIds).toEqual(['pat-2']);
      expect(target.records()[0]?.fields).toEqual({ familyName: 'Lind', phone: '5550111' });

      const applied = firstValueFrom(
        engine.events$.pipe(filter((event) => event.type === 'manual-resolution-applied')),
      );
      reviewQueue.decide({
        resourceType: 'Patient',
        resourceId: 'pat-2',
        fields: { familyName: 'Lind-Berg' },
        reviewer: 'registrar',
        note: 'confirmed with patient',
      });

      expect(await applied).toMatchObject({ outcome: 'updated' });
      expect(target.records()[0]?.fields).toEqual({ familyName: 'Lind-Berg', phone: '5550111' });
    });

    it('should continue past isolated failures below the abort threshold', async () => {
      extraction.put(patient('pat-1', { name: { family: 'Okafor' } }, at(9)));
      extraction.put(patient('pat-2', { birthDate: '1990-01-01' }, at(9)));
      extraction.put(patient('pat-3', { name: { family: 'Lind' } }, at(9)));
      extraction.fail('Patient', transientIOError('row 17 unreadable', 'extract', false));

      const result = await sync();

      expect(result.status).toBe('completed');
      expect(result.success).toBe(false);
      expect(result.recordsProcessed).toBe(4);
      expect(result.recordsCreated).toBe(2);
      expect(result.recordsFailed).toBe(2);
      expect(result.errors.map((error) => error.code)).toEqual(['missing-required-field', 'transient-io-error']);
    });

    it('should report progress through status and state streams', async () => {
      extraction.put(patient('pat-1', { name: { family: 'Okafor' } }, at(9)));

      const states = firstValueFrom(engine.state$.pipe(toArray()));
      await sync();
      engine.dispose();

      const snapshots = await states;
      expect(snapshots.map((state) => state.status)).toEqual([
        'queued',
        'extracting',
        'transforming',
        'resolving',
        'applying',
        'applying',
        'extracting',
        'completed',
      ]);
    });
  });

  describe('Conflict resolution', () => {
    const conflict = (field: string, sourceValue: string, targetValue: string): DataConflict => ({
      conflictId: `conflict_Patient_pat-9_${field}_data`,
      resourceType: 'Patient',
      resourceId: 'pat-9',
      field,
      conflictType: 'data',
      sourceValue,
      targetValue,
      sourceUpdatedAt: at(9),
      targetUpdatedAt: at(10),
      sourceSystem: 'cerner',
      targetSystem: 'registry',
      severity: 'medium',
      detectedAt: NOW,
    });

    it('should resolve a batch of conflicts under one strategy', () => {
      const result = engine.resolveConflicts({
        conflicts: [conflict('familyName', 'Lind', 'Lindh'), conflict('phone', '5550111', '5550112')],
        strategy: { name: 'targetWins', rules: [] },
      });

      expect(E.isRight(result)).toBe(true);
      if (E.isRight(result)) {
        expect(result.right.success).toBe(true);
        expect(result.right.conflictsResolved).toBe(2);
        expect(result.right.resolutions.map((r) => r.finalValue)).toEqual(['Lindh', '5550112']);
      }
    });

    it('should reject malformed conflict data', () => {
      const result = engine.resolveConflicts({
        conflicts: [{ ...conflict('phone', 'a', 'b'), conflictId: '' }],
        strategy: { name: 'sourceWins', rules: [] },
      });

      expect(E.isLeft(result)).toBe(true);
    });
  });

  describe('Configuration', () => {
    it('should refuse to start with a malformed mapping', () => {
      const created = createEhrSyncEngine(
        { extraction, target },
        {
          ...config,
          mappings: [
            {
              sourceSystem: 'cerner',
              targetSystem: 'registry',
              resourceType: 'Patient',
              fieldMappings: [
                { sourceField: 'a', targetField: 'x', sourceType: 'string', targetType: 'string', required: false },
                { sourceField: 'b', targetField: 'x', sourceType: 'string', targetType: 'string', required: false },
              ],
            },
          ],
        },
      );

      expect(E.isLeft(created)).toBe(true);
      if (E.isLeft(created)) {
        expect(created.left.message).toBe('Schema mapping has duplicate fields');
      }
    });

    it('should refuse a mapping whose dry run finds errors', () => {
      const created = createEhrSyncEngine(
        { extraction, target },
        {
          ...config,
          mappings: [
            {
              sourceSystem: 'cerner',
              targetSystem: 'registry',
              resourceType: 'Patient',
              fieldMappings: [
                {
                  sourceField: 'name.family',
                  targetField: 'familyName',
                  sourceType: 'string',
                  targetType: 'string',
                  required: true,
                  transform: 'titleCase',
                },
              ],
            },
          ],
        },
      );

      expect(E.isLeft(created)).toBe(true);
      if (E.isLeft(created)) {
        expect(created.left.message).toBe('Schema mapping for Patient (cerner -> registry) failed validation');
        expect(created.left.details).toEqual([
          { path: 'fieldMappings.0.transform', message: 'Unknown transform "titleCase"' },
        ]);
      }
    });

    it('should dry-run a mapping against sample records', () => {
      const result = engine.validateMapping(patientMapping, [
        patient('pat-1', { name: { family: 'Okafor' } }, at(9)),
        patient('pat-2', { phone: '5550100' }, at(9)),
      ]);

      expect(E.isRight(result)).toBe(true);
      if (E.isRight(result)) {
        expect(result.right.samplesChecked).toBe(2);
        expect(result.right.samplesPassed).toBe(1);
        expect(result.right.issues.map((issue) => [issue.code, issue.resourceId])).toEqual([
          ['sample-failed', 'pat-2'],
        ]);
      }
    });

    it('should report a missing sampling source', async () => {
      const created = createEhrSyncEngine({ extraction, target }, config);
      if (E.isLeft(created)) {
        throw new Error(created.left.message);
      }

      const result = await created.right.checkConsistency({
        sources: [{ sourceId: 'registry', system: 'cerner', resourceType: 'Patient' }],
        rules: [],
      })();

      expect(E.isLeft(result)).toBe(true);
      if (E.isLeft(result)) {
        expect(result.left.type).toBe('fatal-run-error');
      }
      created.right.dispose();
    });
  });
});
