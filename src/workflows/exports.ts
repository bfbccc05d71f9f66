/**
 * Response export lifecycle.
 *
 *   requested → inProgress → complete
 *                          ↘ failed
 *
 * Only `inProgress` moves. Once an export is complete or failed, further
 * polls leave it where it is.
 */

import { writeFile } from 'node:fs/promises';
import type { ExportProgress, QualtricsApi } from '../api/types.js';

export type ExportState =
  | { phase: 'requested'; id: string }
  | { phase: 'inProgress'; id: string; percentComplete: number }
  | { phase: 'complete'; id: string; fileUrl: string }
  | { phase: 'failed'; id: string; reason: string };

export function requested(id: string): ExportState {
  return { phase: 'requested', id };
}

export function isTerminal(state: ExportState): boolean {
  return state.phase === 'complete' || state.phase === 'failed';
}

export function advanceExport(state: ExportState, progress: ExportProgress): ExportState {
  if (isTerminal(state)) return state;

  switch (progress.status) {
    case 'inProgress':
      return { phase: 'inProgress', id: state.id, percentComplete: progress.percentComplete };
    case 'complete':
      return { phase: 'complete', id: state.id, fileUrl: progress.fileUrl };
    case 'failed':
      return { phase: 'failed', id: state.id, reason: progress.reason };
  }
}

/** Polls once and returns the next state. Terminal states are not polled again. */
export async function pollExport(api: QualtricsApi, state: ExportState): Promise<ExportState> {
  if (isTerminal(state)) return state;
  return advanceExport(state, await api.getResponseExportProgress(state.id));
}

/**
 * Saves the export archive. Takes the export id or the file URL reported
 * by a completed poll.
 */
export async function downloadResponseExportFile(
  api: QualtricsApi,
  exportIdOrUrl: string,
  filename: string
): Promise<number> {
  const bytes = await api.getResponseExportFile(exportIdOrUrl);
  await writeFile(filename, bytes);
  return bytes.length;
}
