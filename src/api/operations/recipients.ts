import type { Transport } from '../http.js';
import { anyResultSchema, recipientIdResultSchema, recipientResultSchema } from '../schemas/index.js';
import type { QualtricsApi } from '../types.js';
import { callV2 } from '../v2.js';

export type RecipientOperations = Pick<QualtricsApi, 'addRecipient' | 'getRecipient' | 'removeRecipient'>;

export function recipientOperations(transport: Transport): RecipientOperations {
  return {
    addRecipient: async (params) => {
      const result = await callV2(
        transport,
        {
          request: 'addRecipient',
          params: {
            LibraryID: params.libraryId,
            PanelID: params.panelId,
            FirstName: params.firstName,
            LastName: params.lastName,
            Email: params.email,
            ExternalDataRef: params.externalDataRef,
            Language: params.language,
            ...params.extra,
          },
          embeddedData: params.embeddedData,
        },
        recipientIdResultSchema
      );
      return result.RecipientID;
    },

    /** The recipient and their response history. */
    getRecipient: async ({ libraryId, recipientId, extra }) => {
      const result = await callV2(
        transport,
        { request: 'getRecipient', params: { LibraryID: libraryId, RecipientID: recipientId, ...extra } },
        recipientResultSchema
      );
      return result.Recipient;
    },

    removeRecipient: async ({ libraryId, panelId, recipientId, extra }) => {
      await callV2(
        transport,
        {
          request: 'removeRecipient',
          params: { LibraryID: libraryId, PanelID: panelId, RecipientID: recipientId, ...extra },
        },
        anyResultSchema
      );
    },
  };
}
