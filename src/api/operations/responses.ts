import { toCsv } from '../csv.js';
import { RESPONSE_DELETED, RemoteOperationError } from '../errors.js';
import type { Transport } from '../http.js';
import { data, empty } from '../outcome.js';
import { joinList } from '../params.js';
import { anyResultSchema, htmlResultSchema, legacyResponseMapSchema } from '../schemas/index.js';
import type { ImportResponsesParams, LegacyResponseQuery, QualtricsApi } from '../types.js';
import { callV2 } from '../v2.js';

export type ResponseOperations = Pick<
  QualtricsApi,
  | 'getLegacyResponseData'
  | 'getResponse'
  | 'importResponses'
  | 'importResponsesAsDict'
  | 'updateResponseEmbeddedData'
  | 'getSingleResponseHTML'
>;

export function responseOperations(transport: Transport): ResponseOperations {
  /** Responses keyed by response id, in the order the platform sent them. */
  const fetchLegacy = (query: LegacyResponseQuery) =>
    callV2(
      transport,
      {
        request: 'getLegacyResponseData',
        bare: true,
        params: {
          SurveyID: query.surveyId,
          LastResponseID: query.lastResponseId,
          Limit: query.limit,
          ResponseID: query.responseId,
          ResponseSetID: query.responseSetId,
          SubgroupID: query.subgroupId,
          StartDate: query.startDate,
          EndDate: query.endDate,
          Questions: joinList(query.questions),
          Labels: query.labels,
          ExportTags: query.exportTags,
          ExportQuestionIDs: query.exportQuestionIds,
          LocalTime: query.localTime,
          UnansweredRecode: query.unansweredRecode,
          PanelID: query.panelId,
          ResponsesInProgress: query.responsesInProgress,
          LocationData: query.locationData,
          ...query.extra,
        },
      },
      legacyResponseMapSchema
    );

  const importResponses = async (params: ImportResponsesParams) => {
    await callV2(
      transport,
      {
        request: 'importResponses',
        params: {
          SurveyID: params.surveyId,
          ResponseSetID: params.responseSetId,
          FileURL: params.fileUrl,
          Delimiter: params.delimiter,
          Enclosure: params.enclosure,
          IgnoreValidation: params.ignoreValidation,
          DecimalFormat: params.decimalFormat,
          ...params.extra,
        },
        body: params.fileContents ? { kind: 'form', files: { FileContents: params.fileContents } } : undefined,
      },
      anyResultSchema
    );
  };

  return {
    getLegacyResponseData: async (query) => {
      const responses = await fetchLegacy(query);
      return Object.keys(responses).length === 0 ? empty('no-content') : data(responses);
    },

    /**
     * A single response. The survey id is required by the API.
     * A response the platform no longer returns is reported as deleted.
     */
    getResponse: async ({ surveyId, responseId, extra }) => {
      const responses = await fetchLegacy({ surveyId, responseId, extra });
      const response = Object.hasOwn(responses, responseId) ? responses[responseId] : undefined;
      if (!response) {
        throw new RemoteOperationError(
          200,
          'OK',
          RESPONSE_DELETED,
          `Qualtrics error: ResponseID ${responseId} not in response (probably deleted)`
        );
      }
      return response;
    },

    importResponses,

    importResponsesAsDict: async ({ responses, ...options }) => {
      if (responses.length === 0) return;
      const headers = Object.keys(responses[0]);
      await importResponses({ ...options, fileContents: toCsv(responses, headers) });
    },

    updateResponseEmbeddedData: async ({ surveyId, responseId, embeddedData, extra }) => {
      await callV2(
        transport,
        {
          request: 'updateResponseEmbeddedData',
          params: { SurveyID: surveyId, ResponseID: responseId, ...extra },
          embeddedData,
        },
        anyResultSchema
      );
    },

    /** The response rendered as HTML by the platform. */
    getSingleResponseHTML: ({ surveyId, responseId, extra }) =>
      callV2(
        transport,
        { request: 'getSingleResponseHTML', params: { SurveyID: surveyId, ResponseID: responseId, ...extra } },
        htmlResultSchema
      ),
  };
}
