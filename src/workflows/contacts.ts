import { isApiError } from '../api/errors.js';
import type { QualtricsApi } from '../api/types.js';

export interface TruncateReport {
  removed: string[];
  failed: string[];
}

/**
 * Removes every contact from a list while keeping the list itself.
 * Contacts the platform refuses to remove are reported, not retried.
 */
export async function truncateContactList(
  api: QualtricsApi,
  { libraryId, listId }: { libraryId: string; listId: string }
): Promise<TruncateReport> {
  const report: TruncateReport = { removed: [], failed: [] };
  const contacts = await api.getListContacts({ libraryId, listId });
  if (contacts.kind === 'empty') return report;

  for (const { RecipientID } of contacts.data) {
    try {
      await api.removeContact({ libraryId, listId, recipientId: RecipientID });
      report.removed.push(RecipientID);
    } catch (err) {
      if (!isApiError(err)) throw err;
      report.failed.push(RecipientID);
    }
  }
  return report;
}
