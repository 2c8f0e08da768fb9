import { describe, it, expect } from 'vitest';
import { classifyFile, isNewer, planSync } from './sync-plan.js';
import { RemoteFile, SyncDecision } from '../types/index.js';

function remote(id: string, modifiedTime = '2024-06-01T10:00:00.000Z'): RemoteFile {
  return {
    id,
    name: `${id}.txt`,
    path: `docs/${id}.txt`,
    mimeType: 'text/plain',
    size: 10,
    modifiedTime,
    url: `https://drive.example/${id}`,
  };
}

describe('isNewer', () => {
  it('should compare instants, not strings', () => {
    expect(isNewer('2024-06-01T12:00:00+02:00', '2024-06-01T10:00:00.000Z')).toBe(false);
    expect(isNewer('2024-06-01T10:00:01Z', '2024-06-01T10:00:00.000Z')).toBe(true);
  });

  it('should treat equal timestamps as unchanged', () => {
    expect(isNewer('2024-06-01T10:00:00.000Z', '2024-06-01T10:00:00Z')).toBe(false);
  });

  it('should treat unparsable timestamps as changed', () => {
    expect(isNewer('2024-06-01T10:00:00.000Z', 'not a date')).toBe(true);
    expect(isNewer('', '2024-06-01T10:00:00.000Z')).toBe(true);
  });
});

describe('classifyFile', () => {
  const file = remote('a', '2024-06-01T10:00:00.000Z');

  it('should mark files missing from the index as new in both modes', () => {
    expect(classifyFile(file, undefined, 'full')).toBe(SyncDecision.IndexNew);
    expect(classifyFile(file, undefined, 'incremental')).toBe(SyncDecision.IndexNew);
  });

  it('should reindex every known file in full mode', () => {
    expect(classifyFile(file, '2030-01-01T00:00:00.000Z', 'full')).toBe(
      SyncDecision.IndexUpdated
    );
  });

  it('should reindex only strictly newer files in incremental mode', () => {
    expect(classifyFile(file, '2024-05-31T10:00:00.000Z', 'incremental')).toBe(
      SyncDecision.IndexUpdated
    );
    expect(classifyFile(file, '2024-06-01T10:00:00.000Z', 'incremental')).toBe(
      SyncDecision.SkipUnchanged
    );
    expect(classifyFile(file, '2024-07-01T10:00:00.000Z', 'incremental')).toBe(
      SyncDecision.SkipUnchanged
    );
  });
});

describe('planSync', () => {
  it('should split files into index, skip and delete sets', () => {
    const files = [
      remote('new'),
      remote('changed', '2024-06-02T00:00:00.000Z'),
      remote('same', '2024-06-01T00:00:00.000Z'),
    ];
    const indexed = new Map([
      ['changed', '2024-06-01T00:00:00.000Z'],
      ['same', '2024-06-01T00:00:00.000Z'],
      ['stale', '2024-01-01T00:00:00.000Z'],
    ]);

    const plan = planSync(files, indexed, 'incremental');

    expect(plan.toIndex).toEqual([
      { file: files[0], decision: SyncDecision.IndexNew },
      { file: files[1], decision: SyncDecision.IndexUpdated },
    ]);
    expect(plan.toSkip).toEqual([files[2]]);
    expect(plan.toDelete).toEqual(['stale']);
    expect(plan.duplicates).toEqual([]);
  });

  it('should plan nothing for an empty remote and an empty index', () => {
    expect(planSync([], new Map(), 'full')).toEqual({
      toIndex: [],
      toSkip: [],
      toDelete: [],
      duplicates: [],
    });
  });

  it('should keep the first occurrence of a duplicated id', () => {
    const first = remote('dup');
    const second = { ...remote('dup'), path: 'other/dup.txt' };

    const plan = planSync([first, second], new Map(), 'full');

    expect(plan.toIndex).toEqual([{ file: first, decision: SyncDecision.IndexNew }]);
    expect(plan.duplicates).toEqual(['dup']);
  });

  it('should delete everything when the remote is empty', () => {
    const indexed = new Map([
      ['a', '2024-01-01T00:00:00.000Z'],
      ['b', '2024-01-01T00:00:00.000Z'],
    ]);

    expect(planSync([], indexed, 'incremental').toDelete).toEqual(['a', 'b']);
  });
});
