import { CONTACT_HEADERS, contactColumns, toCsv } from '../csv.js';
import type { ColumnIndexes } from '../csv.js';
import type { Transport } from '../http.js';
import { data, empty } from '../outcome.js';
import { joinList } from '../params.js';
import {
  anyResultSchema,
  panelCountResultSchema,
  panelIdResultSchema,
  panelListResultSchema,
  panelMembersSchema,
} from '../schemas/index.js';
import type { QualtricsApi } from '../types.js';
import { callV2 } from '../v2.js';

export type PanelOperations = Pick<
  QualtricsApi,
  | 'createPanel'
  | 'deletePanel'
  | 'getPanelMemberCount'
  | 'getPanels'
  | 'getPanel'
  | 'importPanel'
  | 'importJsonPanel'
>;

/**
 * Column parameters for an import. Positions found in the header row are
 * used unless the caller gave them explicitly.
 */
export function importColumns(csv: string, columnHeaders: boolean | undefined, columns: ColumnIndexes = {}): ColumnIndexes {
  if (!columnHeaders) return columns;
  return { ...contactColumns(csv), ...columns };
}

export function panelOperations(transport: Transport): PanelOperations {
  return {
    createPanel: async ({ libraryId, name, category, extra }) => {
      const result = await callV2(
        transport,
        { request: 'createPanel', params: { LibraryID: libraryId, Name: name, Category: category, ...extra } },
        panelIdResultSchema
      );
      return result.PanelID;
    },

    deletePanel: async ({ libraryId, panelId, extra }) => {
      await callV2(
        transport,
        { request: 'deletePanel', params: { LibraryID: libraryId, PanelID: panelId, ...extra } },
        anyResultSchema
      );
    },

    getPanelMemberCount: async ({ libraryId, panelId, extra }) => {
      const result = await callV2(
        transport,
        { request: 'getPanelMemberCount', params: { LibraryID: libraryId, PanelID: panelId, ...extra } },
        panelCountResultSchema
      );
      return result.Count;
    },

    getPanels: async (libraryId) => {
      const result = await callV2(
        transport,
        { request: 'getPanels', params: { LibraryID: libraryId } },
        panelListResultSchema
      );
      return result.Panels;
    },

    /** Panel members; a panel with nobody in it is an empty outcome. */
    getPanel: async (params) => {
      const members = await callV2(
        transport,
        {
          request: 'getPanel',
          bare: true,
          params: {
            LibraryID: params.libraryId,
            PanelID: params.panelId,
            EmbeddedData: joinList(params.embeddedData),
            LastRecipientID: params.lastRecipientId,
            NumberOfRecords: params.numberOfRecords,
            ExportLanguage: params.exportLanguage,
            Unsubscribed: params.unsubscribed,
            Subscribed: params.subscribed,
            ...params.extra,
          },
        },
        panelMembersSchema
      );
      return members.length === 0 ? empty('no-content') : data(members);
    },

    importPanel: async ({ libraryId, name, csv, columnHeaders, columns, panelId, extra }) => {
      const result = await callV2(
        transport,
        {
          request: 'importPanel',
          body: { kind: 'csv', text: csv },
          params: {
            LibraryID: libraryId,
            Name: name,
            PanelID: panelId,
            ColumnHeaders: columnHeaders,
            ...importColumns(csv, columnHeaders, columns),
            ...extra,
          },
        },
        panelIdResultSchema
      );
      return result.PanelID;
    },

    importJsonPanel: async ({ libraryId, name, contacts, headers = [...CONTACT_HEADERS], extra }) => {
      const csv = toCsv(contacts, headers);
      const result = await callV2(
        transport,
        {
          request: 'importPanel',
          body: { kind: 'csv', text: csv },
          params: {
            LibraryID: libraryId,
            Name: name,
            ColumnHeaders: true,
            ...importColumns(csv, true),
            ...extra,
          },
        },
        panelIdResultSchema
      );
      return result.PanelID;
    },
  };
}
