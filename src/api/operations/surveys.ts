import type { Transport } from '../http.js';
import { data } from '../outcome.js';
import { anyResultSchema, surveyIdResultSchema, surveyListResultSchema } from '../schemas/index.js';
import type { QualtricsApi, SurveyDocument } from '../types.js';
import { callV2, callV2Document } from '../v2.js';

export type SurveyOperations = Pick<
  QualtricsApi,
  'getSurveys' | 'getSurvey' | 'importSurvey' | 'deleteSurvey' | 'activateSurvey' | 'deactivateSurvey'
>;

export function surveyOperations(transport: Transport): SurveyOperations {
  const bySurveyId = async (request: string, surveyId: string) => {
    await callV2(transport, { request, params: { SurveyID: surveyId } }, anyResultSchema);
  };

  return {
    getSurveys: async (extra) => {
      const result = await callV2(transport, { request: 'getSurveys', params: { ...extra } }, surveyListResultSchema);
      return result.Surveys;
    },

    /**
     * Survey definition as XML (answers are not included).
     * An invalid token gives an empty outcome instead of an error.
     */
    getSurvey: async (surveyId) => {
      const outcome = await callV2Document(transport, { request: 'getSurvey', params: { SurveyID: surveyId } });
      return outcome.kind === 'data' ? data<SurveyDocument>({ format: 'xml', document: outcome.data }) : outcome;
    },

    /**
     * If the file contents cannot be read the platform still creates an
     * empty survey and reports the problem; the id is returned either way.
     */
    importSurvey: async ({ importFormat, name, activate, url, fileContents, ownerId, extra }) => {
      const result = await callV2(
        transport,
        {
          request: 'importSurvey',
          params: { ImportFormat: importFormat, Name: name, Activate: activate, URL: url, OwnerID: ownerId, ...extra },
          body: fileContents ? { kind: 'form', files: { FileContents: fileContents } } : undefined,
        },
        surveyIdResultSchema
      );
      return result.SurveyID;
    },

    deleteSurvey: (surveyId) => bySurveyId('deleteSurvey', surveyId),
    activateSurvey: (surveyId) => bySurveyId('activateSurvey', surveyId),
    deactivateSurvey: (surveyId) => bySurveyId('deactivateSurvey', surveyId),
  };
}
