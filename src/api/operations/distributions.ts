/**
 * Mailings and distributions.
 *
 * Mail requests are queued by the platform: a returned distribution id
 * means the mailing was accepted, not that it was delivered. Delivery can be
 * checked later with `getDistributions`.
 */

import type { Transport } from '../http.js';
import { distributionIdResultSchema, recordResultSchema } from '../schemas/index.js';
import type { QualtricsApi } from '../types.js';
import type { WireParams } from '../params.js';
import { callV2 } from '../v2.js';

export type DistributionOperations = Pick<
  QualtricsApi,
  'sendSurveyToIndividual' | 'sendSurveyToPanel' | 'sendReminder' | 'createDistribution' | 'getDistributions'
>;

interface Mailing {
  sendDate: string;
  fromEmail: string;
  fromName: string;
  subject: string;
  messageId: string;
  sentFromAddress?: string;
}

function mailingParams(mailing: Mailing): WireParams {
  return {
    SendDate: mailing.sendDate,
    SentFromAddress: mailing.sentFromAddress,
    FromEmail: mailing.fromEmail,
    FromName: mailing.fromName,
    Subject: mailing.subject,
    MessageID: mailing.messageId,
  };
}

export function distributionOperations(transport: Transport): DistributionOperations {
  const distribute = async (request: string, params: WireParams) => {
    const result = await callV2(transport, { request, params }, distributionIdResultSchema);
    return result.EmailDistributionID;
  };

  return {
    sendSurveyToIndividual: (params) =>
      distribute('sendSurveyToIndividual', {
        SurveyID: params.surveyId,
        ...mailingParams(params),
        MessageLibraryID: params.messageLibraryId,
        PanelID: params.panelId,
        PanelLibraryID: params.panelLibraryId,
        RecipientID: params.recipientId,
        ...params.extra,
      }),

    sendSurveyToPanel: (params) =>
      distribute('sendSurveyToPanel', {
        SurveyID: params.surveyId,
        ...mailingParams(params),
        MessageLibraryID: params.messageLibraryId,
        PanelID: params.panelId,
        PanelLibraryID: params.panelLibraryId,
        LinkType: params.linkType,
        ...params.extra,
      }),

    sendReminder: (params) =>
      distribute('sendReminder', {
        ParentEmailDistributionID: params.parentEmailDistributionId,
        ...mailingParams(params),
        LibraryID: params.libraryId,
        ...params.extra,
      }),

    /** Creates a distribution without sending mail; links can be generated from it. */
    createDistribution: (params) =>
      distribute('createDistribution', {
        SurveyID: params.surveyId,
        PanelID: params.panelId,
        Description: params.description,
        PanelLibraryID: params.panelLibraryId,
        ...params.extra,
      }),

    getDistributions: ({ surveyId, distributionId, libraryId, extra }) =>
      callV2(
        transport,
        {
          request: 'getDistributions',
          params: { SurveyID: surveyId, DistributionID: distributionId, LibraryID: libraryId, ...extra },
        },
        recordResultSchema
      ),
  };
}
