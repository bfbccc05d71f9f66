/**
 * Contact lists in the directory (the `TA` product endpoint).
 */

import type { Transport } from '../http.js';
import { data, empty } from '../outcome.js';
import { joinList } from '../params.js';
import { anyResultSchema, contactListSchema, listIdResultSchema } from '../schemas/index.js';
import type { QualtricsApi } from '../types.js';
import { callV2 } from '../v2.js';
import { importColumns } from './panels.js';

export type ContactOperations = Pick<QualtricsApi, 'importContacts' | 'getListContacts' | 'removeContact'>;

export function contactOperations(transport: Transport): ContactOperations {
  return {
    /**
     * Starts an asynchronous import; rows with a ContactID update that
     * contact, others create one.
     */
    importContacts: async ({ libraryId, name, csv, columnHeaders, columns, listId, extra }) => {
      const result = await callV2(
        transport,
        {
          request: 'importContacts',
          product: 'TA',
          body: { kind: 'csv', text: csv },
          params: {
            LibraryID: libraryId,
            Name: name,
            ListID: listId,
            ColumnHeaders: columnHeaders,
            ...importColumns(csv, columnHeaders, columns),
            ...extra,
          },
        },
        listIdResultSchema
      );
      return result.ListID;
    },

    getListContacts: async (params) => {
      const contacts = await callV2(
        transport,
        {
          request: 'getListContacts',
          product: 'TA',
          bare: true,
          params: {
            LibraryID: params.libraryId,
            ListID: params.listId,
            EmbeddedData: joinList(params.embeddedData),
            ContactHistory: params.contactHistory,
            LastRecipientID: params.lastRecipientId,
            NumberOfRecords: params.numberOfRecords,
            ExportLanguage: params.exportLanguage,
            Unsubscribed: params.unsubscribed,
            Subscribed: params.subscribed,
            ...params.extra,
          },
        },
        contactListSchema
      );
      return contacts.length === 0 ? empty('no-content') : data(contacts);
    },

    removeContact: async ({ libraryId, listId, recipientId, extra }) => {
      await callV2(
        transport,
        {
          request: 'removeContact',
          product: 'TA',
          params: { LibraryID: libraryId, ListID: listId, RecipientID: recipientId, ...extra },
        },
        anyResultSchema
      );
    },
  };
}
