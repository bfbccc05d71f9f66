import { describe, it, expect } from 'vitest';
import { toExportProgress } from '../api/operations/exports.js';
import { advanceExport, isTerminal, requested } from '../workflows/exports.js';
import type { ExportState } from '../workflows/exports.js';

const FILE_URL = 'https://qualtrics.test/API/v3/responseexports/ES_1/file';

describe('Export status mapping', () => {
  it('normalizes the spelling of in-progress', () => {
    for (const status of ['in progress', 'inProgress', 'IN_PROGRESS']) {
      expect(toExportProgress({ percentComplete: 20, status })).toEqual({ status: 'inProgress', percentComplete: 20 });
    }
  });

  it('needs a file URL to be complete', () => {
    expect(toExportProgress({ percentComplete: 100, status: 'complete', file: FILE_URL })).toEqual({
      status: 'complete',
      percentComplete: 100,
      fileUrl: FILE_URL,
    });
    expect(toExportProgress({ percentComplete: 100, status: 'complete' })).toBeNull();
  });

  it('maps failed and cancelled to failed', () => {
    expect(toExportProgress({ percentComplete: 5, status: 'failed' })).toEqual({
      status: 'failed',
      percentComplete: 5,
      reason: 'failed',
    });
    expect(toExportProgress({ percentComplete: 5, status: 'cancelled' })?.status).toBe('failed');
  });

  it('does not guess unknown statuses', () => {
    expect(toExportProgress({ percentComplete: 0, status: 'queued' })).toBeNull();
  });
});

describe('Export lifecycle', () => {
  it('starts requested and moves to inProgress', () => {
    const state = advanceExport(requested('ES_1'), { status: 'inProgress', percentComplete: 50 });
    expect(state).toEqual({ phase: 'inProgress', id: 'ES_1', percentComplete: 50 });
    expect(isTerminal(state)).toBe(false);
  });

  it('reaches complete with the file URL', () => {
    const state = advanceExport(
      { phase: 'inProgress', id: 'ES_1', percentComplete: 50 },
      { status: 'complete', percentComplete: 100, fileUrl: FILE_URL }
    );
    expect(state).toEqual({ phase: 'complete', id: 'ES_1', fileUrl: FILE_URL });
    expect(isTerminal(state)).toBe(true);
  });

  it('does not leave terminal states', () => {
    const complete: ExportState = { phase: 'complete', id: 'ES_1', fileUrl: FILE_URL };
    const failed: ExportState = { phase: 'failed', id: 'ES_2', reason: 'cancelled' };

    expect(advanceExport(complete, { status: 'inProgress', percentComplete: 10 })).toBe(complete);
    expect(advanceExport(failed, { status: 'complete', percentComplete: 100, fileUrl: FILE_URL })).toBe(failed);
  });
});
