/**
 * Response exports (API v3).
 *
 * An export is created, polled until it reaches a terminal status, then its
 * archive is downloaded. Each step is one call; the caller owns the cadence.
 */

import { ProtocolError } from '../errors.js';
import type { Transport } from '../http.js';
import { exportCreatedSchema, exportProgressSchema } from '../schemas/index.js';
import type { ExportProgressPayload } from '../schemas/index.js';
import type { ExportProgress, QualtricsApi } from '../types.js';
import { callV3, decodeV3, sendV3 } from '../v3.js';

export type ExportOperations = Pick<
  QualtricsApi,
  'createResponseExport' | 'getResponseExportProgress' | 'getResponseExportFile'
>;

const ZIP_SIGNATURE = [0x50, 0x4b];

export function isZipArchive(bytes: Uint8Array): boolean {
  return bytes.length >= ZIP_SIGNATURE.length && ZIP_SIGNATURE.every((byte, i) => bytes[i] === byte);
}

function normalizeStatus(status: string): string {
  return status.toLowerCase().replace(/[\s_-]/g, '');
}

function isCompleteStatus(status: string): boolean {
  const normalized = normalizeStatus(status);
  return normalized === 'complete' || normalized === 'completed';
}

/**
 * Maps the platform's progress report onto the export states.
 * `cancelled` is terminal and treated as a failure.
 */
export function toExportProgress(payload: ExportProgressPayload): ExportProgress | null {
  switch (normalizeStatus(payload.status)) {
    case 'inprogress':
      return { status: 'inProgress', percentComplete: payload.percentComplete };
    case 'complete':
    case 'completed':
      return payload.file ? { status: 'complete', percentComplete: 100, fileUrl: payload.file } : null;
    case 'failed':
    case 'cancelled':
      return { status: 'failed', percentComplete: payload.percentComplete, reason: payload.status };
    default:
      return null;
  }
}

export function exportOperations(transport: Transport): ExportOperations {
  return {
    createResponseExport: async (params) => {
      const result = await callV3(
        transport,
        {
          method: 'POST',
          path: '/responseexports',
          body: {
            format: params.format,
            surveyId: params.surveyId,
            lastResponseId: params.lastResponseId,
            startDate: params.startDate,
            endDate: params.endDate,
            limit: params.limit,
            includedQuestionIds:
              params.includedQuestionIds && params.includedQuestionIds.length > 0 ? params.includedQuestionIds : undefined,
            useLabels: params.useLabels,
            decimalSeparator: params.decimalSeparator,
            seenUnansweredRecode: params.seenUnansweredRecode,
            useLocalTime: params.useLocalTime,
          },
        },
        exportCreatedSchema
      );
      return { id: result.id };
    },

    getResponseExportProgress: async (exportId) => {
      const path = `/responseexports/${encodeURIComponent(exportId)}`;
      const response = await sendV3(transport, { method: 'GET', path });
      const payload = decodeV3(transport, response, exportProgressSchema);
      const progress = toExportProgress(payload);
      if (!progress) {
        const message = isCompleteStatus(payload.status)
          ? `Export ${exportId} is complete but has no file URL`
          : `Unknown export status "${payload.status}"`;
        throw new ProtocolError(message, response.text, {
          status: response.status,
          requestId: response.requestId,
        });
      }
      return progress;
    },

    /** The export archive (zip). Accepts the export id or the file URL from a completed poll. */
    getResponseExportFile: async (exportIdOrUrl) => {
      const path = /^https:\/\//i.test(exportIdOrUrl)
        ? exportIdOrUrl
        : `/responseexports/${encodeURIComponent(exportIdOrUrl)}/file`;
      const response = await sendV3(transport, { method: 'GET', path });
      if (!isZipArchive(response.bytes)) {
        throw new ProtocolError('Export file is not a zip archive', response.text, {
          status: response.status,
          requestId: response.requestId,
        });
      }
      return response.bytes;
    },
  };
}
