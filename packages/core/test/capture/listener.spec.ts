import { beforeEach, describe, expect, it } from 'vitest';
import { createChangeCaptureListener, runFlushCycle } from '../../src/capture/listener.js';
import type { ChangeCaptureListener } from '../../src/capture/types.js';
import { createCommentContext } from '../../src/comment/comment-context.js';
import type { CaptureOptions } from '../../src/config/options.js';
import { createEntityKindRegistry } from '../../src/domain/entity-kinds.js';
import { createElementCreatedEntry, createElementEditedEntry } from '../../src/domain/log-entry.js';
import { AuditConfigurationError, ContractViolationError } from '../../src/errors.js';
import { createEventLogger } from '../../src/logger/event-logger.js';
import { createFakeUnitOfWork, type FakeUnitOfWork, FIXED_NOW, TestEntity } from '../helpers/fixtures.js';

const registry = createEntityKindRegistry({
  User: {},
  AdminUser: { extends: 'User' },
  Part: {},
  PartLot: {},
});

const PART_LOT_MAPPINGS = {
  PartLot: { part: { targetKind: 'Part', inversedBy: 'partLots' } },
};

describe('createChangeCaptureListener', () => {
  let comments: ReturnType<typeof createCommentContext>;

  beforeEach(() => {
    comments = createCommentContext();
  });

  const setup = (
    uow: FakeUnitOfWork,
    overrides: Partial<Omit<CaptureOptions, 'logger' | 'comments' | 'registry'>> = {},
  ): ChangeCaptureListener => {
    const logger = createEventLogger({ sink: uow, clock: () => FIXED_NOW });
    return createChangeCaptureListener({
      registry,
      logger,
      comments,
      fieldBlacklist: { User: ['password'] },
      associationTriggers: { PartLot: ['part'] },
      ...overrides,
    });
  };

  describe('isLoggable', () => {
    it('should accept entities of registered kinds only', () => {
      const listener = setup(createFakeUnitOfWork());

      expect(listener.isLoggable(new TestEntity('Part', {}, 1))).toBe(true);
      expect(listener.isLoggable(new TestEntity('Footprint', {}, 1))).toBe(false);
      expect(listener.isLoggable({ kind: 'Part' })).toBe(false);
      expect(listener.isLoggable(null)).toBe(false);
    });

    it('should reject log entries', () => {
      const listener = setup(createFakeUnitOfWork());
      const entry = createElementCreatedEntry(new TestEntity('Part', {}, 1));

      expect(listener.isLoggable(entry)).toBe(false);
    });
  });

  describe('edits', () => {
    it('should log an edited entry without details when no flag is set', async () => {
      const part = new TestEntity('Part', { name: 'R2' }, 1);
      const uow = createFakeUnitOfWork({
        updates: [part],
        changeSets: new Map([[part, { name: { old: 'R1', new: 'R2' } }]]),
      });

      await runFlushCycle(setup(uow), uow, async () => uow.commitPlanned());

      expect(uow.written).toEqual([
        {
          kind: 'element_edited',
          targetType: 'Part',
          targetId: '1',
          level: 6,
          timestamp: FIXED_NOW,
          actor: { category: 'anonymous', type: 'Anonymous', id: 'anonymous' },
          payload: {},
        },
      ]);
    });

    it('should record changed field names without blacklisted ones', async () => {
      const user = new TestEntity('AdminUser', { name: 'Alicia', password: 'test-secret-2' }, 'u1');
      const uow = createFakeUnitOfWork({
        updates: [user],
        changeSets: new Map([
          [
            user,
            {
              name: { old: 'Alice', new: 'Alicia' },
              password: { old: 'test-secret', new: 'test-secret-2' },
            },
          ],
        ]),
      });

      await runFlushCycle(setup(uow, { saveChangedFields: true }), uow, async () => uow.commitPlanned());

      expect(uow.written[0]?.payload).toEqual({ f: ['name'] });
    });

    it('should record previous values when saveChangedData is set', async () => {
      const user = new TestEntity('User', { name: 'Alicia', email: 'a@example.com' }, 'u1');
      const uow = createFakeUnitOfWork({
        updates: [user],
        changeSets: new Map([
          [
            user,
            {
              name: { old: 'Alice', new: 'Alicia' },
              email: { old: null, new: 'a@example.com' },
              password: { old: 'test-secret', new: 'test-secret-2' },
            },
          ],
        ]),
      });

      await runFlushCycle(setup(uow, { saveChangedData: true, saveChangedFields: true }), uow, async () =>
        uow.commitPlanned(),
      );

      expect(uow.written[0]?.payload).toEqual({ d: { name: 'Alice' } });
    });
  });

  describe('deletes', () => {
    it('should record the display name of a deleted entity', async () => {
      const part = new TestEntity('Part', { name: 'R1', description: null }, 3);
      const uow = createFakeUnitOfWork({
        deletes: [part],
        snapshots: new Map([[part, { name: 'R1', description: null }]]),
      });

      await runFlushCycle(setup(uow), uow, async () => uow.commitPlanned());

      expect(uow.written).toHaveLength(1);
      expect(uow.written[0]?.kind).toBe('element_deleted');
      expect(uow.written[0]?.payload).toEqual({ n: 'R1' });
    });

    it('should record the full redacted snapshot when saveRemovedData is set', async () => {
      const user = new TestEntity('User', { name: 'Alice' }, 'u1');
      const uow = createFakeUnitOfWork({
        deletes: [user],
        snapshots: new Map([[user, { name: 'Alice', password: 'test-secret', lastLogin: null }]]),
      });

      await runFlushCycle(setup(uow, { saveRemovedData: true }), uow, async () => uow.commitPlanned());

      expect(uow.written[0]?.payload).toEqual({ n: 'Alice', d: { name: 'Alice', lastLogin: null } });
    });

    it('should log removed collection elements on the parent when saveChangedData is set', async () => {
      const part = new TestEntity('Part', { name: 'R1' }, 1);
      const lot = new TestEntity('PartLot', { part, amount: 5 }, 7);
      const uow = createFakeUnitOfWork({
        deletes: [lot],
        snapshots: new Map([[lot, { part, amount: 5 }]]),
        mappings: PART_LOT_MAPPINGS,
      });

      await runFlushCycle(setup(uow, { saveChangedData: true }), uow, async () => uow.commitPlanned());

      expect(uow.written.map((entry) => [entry.kind, entry.targetType, entry.targetId])).toEqual([
        ['element_deleted', 'PartLot', '7'],
        ['collection_element_deleted', 'Part', '1'],
      ]);
      expect(uow.written[0]?.payload).toEqual({ d: { part: 1, amount: 5 } });
      expect(uow.written[1]?.payload).toEqual({ n: 'partLots', c: 'PartLot', i: '7' });
    });

    it('should not log removed collection elements without saveChangedData', async () => {
      const part = new TestEntity('Part', { name: 'R1' }, 1);
      const lot = new TestEntity('PartLot', { part }, 7);
      const uow = createFakeUnitOfWork({ deletes: [lot], mappings: PART_LOT_MAPPINGS });

      await runFlushCycle(setup(uow, { saveRemovedData: true }), uow, async () => uow.commitPlanned());

      expect(uow.written.map((entry) => entry.kind)).toEqual(['element_deleted']);
    });

    it('should skip an association that holds null', async () => {
      const lot = new TestEntity('PartLot', { part: null }, 7);
      const uow = createFakeUnitOfWork({ deletes: [lot], mappings: PART_LOT_MAPPINGS });

      await runFlushCycle(setup(uow, { saveChangedData: true }), uow, async () => uow.commitPlanned());

      expect(uow.written.map((entry) => entry.kind)).toEqual(['element_deleted']);
    });

    it('should reject a trigger that is not an association', async () => {
      const lot = new TestEntity('PartLot', { part: null }, 7);
      const uow = createFakeUnitOfWork({ deletes: [lot] });

      await expect(
        runFlushCycle(setup(uow, { saveChangedData: true }), uow, async () => uow.commitPlanned()),
      ).rejects.toThrow(AuditConfigurationError);
    });

    it('should reject an association without an inverse side', async () => {
      const part = new TestEntity('Part', {}, 1);
      const lot = new TestEntity('PartLot', { part }, 7);
      const uow = createFakeUnitOfWork({
        deletes: [lot],
        mappings: { PartLot: { part: { targetKind: 'Part', inversedBy: null } } },
      });

      await expect(
        runFlushCycle(setup(uow, { saveChangedData: true }), uow, async () => uow.commitPlanned()),
      ).rejects.toThrow("Association 'PartLot.part' has no inverse side");
    });

    it('should reject a trigger field the entity does not expose', async () => {
      const lot = new TestEntity('PartLot', { amount: 1 }, 7);
      const uow = createFakeUnitOfWork({ deletes: [lot], mappings: PART_LOT_MAPPINGS });

      await expect(
        runFlushCycle(setup(uow, { saveChangedData: true }), uow, async () => uow.commitPlanned()),
      ).rejects.toThrow("does not expose the field 'part'");
    });
  });

  describe('flush cycle', () => {
    it('should ignore untracked values in the pending lists', async () => {
      const staged = createElementEditedEntry(new TestEntity('Part', {}, 1));
      const uow = createFakeUnitOfWork({
        updates: [staged, new TestEntity('Footprint', {}, 2), 'not-an-entity'],
      });

      await runFlushCycle(setup(uow), uow, async () => uow.commitPlanned());

      expect(uow.written).toEqual([]);
    });

    it('should write scan entries with the primary commit and drain created entries afterwards', async () => {
      const existing = new TestEntity('Part', { name: 'R2' }, 1);
      const created = new TestEntity('Part', { name: 'C1' });
      const uow = createFakeUnitOfWork({
        updates: [existing],
        changeSets: new Map([[existing, { name: { old: 'R1', new: 'R2' } }]]),
      });

      await runFlushCycle(setup(uow), uow, async (cycle) => {
        expect(uow.planned.map((entry) => entry.kind)).toEqual(['element_edited']);
        uow.commitPlanned();
        created.id = 2;
        cycle.entityCreated(created);
        expect(uow.staged.map((entry) => entry.kind)).toEqual(['element_created']);
      });

      expect(uow.calls).toEqual({ recompute: 1, flush: 1 });
      expect(uow.written.map((entry) => [entry.kind, entry.targetId])).toEqual([
        ['element_edited', '1'],
        ['element_created', '2'],
      ]);
    });

    it('should not flush again when nothing was created', async () => {
      const uow = createFakeUnitOfWork();

      await runFlushCycle(setup(uow), uow, async () => uow.commitPlanned());

      expect(uow.calls).toEqual({ recompute: 1, flush: 0 });
    });

    it('should attach one comment to every entry of the flush and clear it afterwards', async () => {
      const part = new TestEntity('Part', { name: 'R2' }, 1);
      const lot = new TestEntity('PartLot', { part }, 7);
      const created = new TestEntity('Part', { name: 'C1' }, 2);
      const uow = createFakeUnitOfWork({
        updates: [part],
        deletes: [lot],
        changeSets: new Map([[part, { name: { old: 'R1', new: 'R2' } }]]),
        mappings: PART_LOT_MAPPINGS,
      });
      const listener = setup(uow, { saveChangedData: true });

      comments.setMessage('Inventory count');
      await runFlushCycle(listener, uow, async (cycle) => {
        uow.commitPlanned();
        cycle.entityCreated(created);
      });

      expect(uow.written.map((entry) => [entry.kind, entry.payload.m])).toEqual([
        ['element_edited', 'Inventory count'],
        ['element_deleted', 'Inventory count'],
        ['collection_element_deleted', undefined],
        ['element_created', 'Inventory count'],
      ]);
      expect(comments.getMessage()).toBeNull();
    });

    it('should reject creation callbacks outside the identifier phase', () => {
      const uow = createFakeUnitOfWork();
      const cycle = setup(uow).beginFlush(uow);

      expect(() => cycle.entityCreated(new TestEntity('Part', {}, 1))).toThrow(ContractViolationError);
      expect(() => cycle.entityCreated(new TestEntity('Part', {}, 1))).toThrow(
        "[entity-audit] entityCreated: called in phase 'scanning', expected 'awaiting-identifiers'",
      );
    });

    it('should reject an entity reported as created twice', () => {
      const uow = createFakeUnitOfWork();
      const cycle = setup(uow).beginFlush(uow);
      const part = new TestEntity('Part', {}, 5);

      cycle.scan();
      cycle.entityCreated(part);

      expect(() => cycle.entityCreated(part)).toThrow('[entity-audit] entityCreated: Part#5 was reported twice');
    });

    it('should reject a second scan', () => {
      const uow = createFakeUnitOfWork();
      const cycle = setup(uow).beginFlush(uow);

      cycle.scan();

      expect(cycle.phase).toBe('awaiting-identifiers');
      expect(() => cycle.scan()).toThrow(ContractViolationError);
    });

    it('should abort and clear the comment when the primary commit fails', async () => {
      const uow = createFakeUnitOfWork();
      const listener = setup(uow);
      let phaseSeen: string | undefined;

      comments.setMessage('Doomed change');
      await expect(
        runFlushCycle(listener, uow, async (cycle) => {
          phaseSeen = cycle.phase;
          throw new Error('disk full');
        }),
      ).rejects.toThrow('disk full');

      expect(phaseSeen).toBe('awaiting-identifiers');
      expect(comments.getMessage()).toBeNull();
      expect(uow.calls.flush).toBe(0);
    });

    it('should snapshot the comment when the cycle begins', () => {
      const uow = createFakeUnitOfWork();
      const listener = setup(uow);

      comments.setMessage('First');
      const cycle = listener.beginFlush(uow);
      comments.setMessage('Second');

      expect(cycle.comment).toBe('First');
    });
  });

  describe('saveChangeSet', () => {
    it('should reject entries that cannot carry a change set', () => {
      const uow = createFakeUnitOfWork();
      const part = new TestEntity('Part', {}, 1);

      expect(() => setup(uow).saveChangeSet(part, createElementCreatedEntry(part), uow)).toThrow(
        "[entity-audit] saveChangeSet: expected an element_edited or element_deleted entry, received 'element_created'",
      );
    });

    it('should attach the change set of an edit', () => {
      const part = new TestEntity('Part', { name: 'R2' }, 1);
      const uow = createFakeUnitOfWork({
        changeSets: new Map([[part, { name: { old: 'R1', new: 'R2' } }]]),
      });
      const entry = createElementEditedEntry(part);

      setup(uow).saveChangeSet(part, entry, uow);

      expect(entry.payload).toEqual({ d: { name: 'R1' } });
    });
  });

  describe('configuration', () => {
    it('should reject a blacklist naming an unregistered kind', () => {
      expect(() => setup(createFakeUnitOfWork(), { fieldBlacklist: { Footprint: ['name'] } })).toThrow(
        AuditConfigurationError,
      );
    });
  });
});
