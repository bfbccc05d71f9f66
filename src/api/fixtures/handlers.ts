/**
 * MSW Request Handlers for API Mocking.
 *
 * Control-panel requests are dispatched on their `Request` query parameter.
 * Fixtures are validated against zod schemas to ensure contract compliance.
 */

import { http, HttpResponse } from 'msw';
import { zipSingleFile } from '../../mock/archive.js';
import {
  contactListSchema,
  distributionIdResultSchema,
  exportCreatedSchema,
  exportProgressSchema,
  legacyResponseMapSchema,
  panelCountResultSchema,
  panelListResultSchema,
  panelMembersSchema,
  recipientResultSchema,
  surveyListResultSchema,
} from '../schemas/index.js';

export const BASE_URL = 'https://qualtrics.test';

// ============================================================================
// Fixture Data
// ============================================================================

export const fixtures = {
  surveys: {
    Surveys: [
      { SurveyID: 'SV_fixturePulse', SurveyName: 'Customer Pulse', SurveyStatus: 'Active', SurveyOwnerID: 'UR_fixture' },
      { SurveyID: 'SV_fixtureExit', SurveyName: 'Exit Interview', SurveyStatus: 'Inactive', SurveyOwnerID: 'UR_fixture' },
    ],
  },

  surveyDocument: '<?xml version="1.0"?><SurveyDefinition><SurveyName>Customer Pulse</SurveyName></SurveyDefinition>',

  panels: {
    Panels: [
      { LibraryID: 'UR_fixture', PanelID: 'ML_fixturePilot', Name: 'Pilot', Category: null },
      { LibraryID: 'UR_fixture', PanelID: 'ML_fixtureStaff', Name: 'Staff', Category: 'Internal' },
    ],
  },

  panelMembers: [
    {
      RecipientID: 'MLRP_fixtureAda',
      FirstName: 'Ada',
      LastName: 'Example',
      Email: 'ada@example.com',
      ExternalDataReference: null,
      Language: 'EN',
      EmbeddedData: { team: 'blue' },
    },
  ],

  panelCount: { Count: '3' },

  recipient: {
    Recipient: {
      RecipientID: 'MLRP_fixtureAda',
      FirstName: 'Ada',
      LastName: 'Example',
      Email: 'ada@example.com',
      ExternalDataReference: null,
      Language: 'EN',
    },
  },

  distribution: { EmailDistributionID: 'EMD_fixtureMail', DistributionQueueID: 'EMDQ_fixture', Success: true },

  responses: {
    R_fixtureOne: { ResponseID: 'R_fixtureOne', Finished: '1', Q1: '4' },
  },

  contacts: [
    { RecipientID: 'MLRP_fixtureBo', FirstName: 'Bo', LastName: 'Example', Email: 'bo@example.com' },
    { RecipientID: 'MLRP_fixtureCy', FirstName: 'Cy', LastName: 'Example', Email: 'cy@example.com' },
  ],

  exportCreated: { id: 'ES_fixtureExport' },

  exportInProgress: { id: 'ES_fixtureExport', percentComplete: 40, status: 'in progress' },

  exportComplete: {
    id: 'ES_fixtureExport',
    percentComplete: 100,
    status: 'complete',
    file: `${BASE_URL}/API/v3/responseexports/ES_fixtureExport/file`,
  },
};

export const exportArchive = zipSingleFile('Customer Pulse.csv', 'ResponseID,Q1\r\nR_fixtureOne,4\r\n');

/**
 * Validates all fixtures against their schemas.
 * Call this in tests to ensure fixtures stay in sync with the API contract.
 */
export function validateFixtures(): void {
  const validations = [
    { name: 'surveys', schema: surveyListResultSchema, data: fixtures.surveys },
    { name: 'panels', schema: panelListResultSchema, data: fixtures.panels },
    { name: 'panelMembers', schema: panelMembersSchema, data: fixtures.panelMembers },
    { name: 'panelCount', schema: panelCountResultSchema, data: fixtures.panelCount },
    { name: 'recipient', schema: recipientResultSchema, data: fixtures.recipient },
    { name: 'distribution', schema: distributionIdResultSchema, data: fixtures.distribution },
    { name: 'responses', schema: legacyResponseMapSchema, data: fixtures.responses },
    { name: 'contacts', schema: contactListSchema, data: fixtures.contacts },
    { name: 'exportCreated', schema: exportCreatedSchema, data: fixtures.exportCreated },
    { name: 'exportInProgress', schema: exportProgressSchema, data: fixtures.exportInProgress },
    { name: 'exportComplete', schema: exportProgressSchema, data: fixtures.exportComplete },
  ];

  for (const { name, schema, data } of validations) {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new Error(`Fixture '${name}' validation failed: ${result.error.message}`);
    }
  }
}

// ============================================================================
// Reply Builders
// ============================================================================

export function v2Success(result?: unknown) {
  return HttpResponse.json({ Meta: { Status: 'Success', Debug: '' }, Result: result });
}

export function v2Error(errorCode: string, errorMessage: string, status = 200) {
  return HttpResponse.json({ Meta: { Status: 'Error', ErrorCode: errorCode, ErrorMessage: errorMessage } }, { status });
}

export function v3Result(result: unknown) {
  return HttpResponse.json({ meta: { httpStatus: '200 - OK' }, result });
}

function requestName(request: Request): string {
  return new URL(request.url).searchParams.get('Request') ?? '';
}

const controlPanelReplies: Record<string, () => Response> = {
  getSurveys: () => v2Success(fixtures.surveys),
  getSurvey: () =>
    new HttpResponse(fixtures.surveyDocument, { headers: { 'Content-Type': 'text/xml; charset=utf-8' } }),
  activateSurvey: () => v2Success(),
  deactivateSurvey: () => v2Success(),
  deleteSurvey: () => v2Success(),
  getPanels: () => v2Success(fixtures.panels),
  getPanel: () => HttpResponse.json(fixtures.panelMembers),
  getPanelMemberCount: () => v2Success(fixtures.panelCount),
  createPanel: () => v2Success({ PanelID: 'ML_fixtureCreated' }),
  deletePanel: () => v2Success(),
  importPanel: () => v2Success({ PanelID: 'ML_fixtureImported' }),
  addRecipient: () => v2Success({ RecipientID: 'MLRP_fixtureAdded' }),
  getRecipient: () => v2Success(fixtures.recipient),
  removeRecipient: () => v2Success(),
  sendSurveyToIndividual: () => v2Success(fixtures.distribution),
  sendSurveyToPanel: () => v2Success(fixtures.distribution),
  sendReminder: () => v2Success(fixtures.distribution),
  createDistribution: () => v2Success(fixtures.distribution),
  getDistributions: () => v2Success({ Distributions: [fixtures.distribution] }),
  getLegacyResponseData: () => HttpResponse.json(fixtures.responses),
  getSingleResponseHTML: () => v2Success('<table><tr><th>Q1</th><td>4</td></tr></table>'),
  getAllSubscriptions: () => v2Success({ Subscriptions: [] }),
};

const contactReplies: Record<string, () => Response> = {
  importContacts: () => v2Success({ ListID: 'ML_fixtureList' }),
  getListContacts: () => HttpResponse.json(fixtures.contacts),
  removeContact: () => v2Success(),
};

function dispatch(replies: Record<string, () => Response>) {
  return ({ request }: { request: Request }) => {
    const name = requestName(request);
    const reply = replies[name];
    return reply ? reply() : v2Error('UNKNOWN_REQUEST', `Unknown request: ${name}`);
  };
}

// ============================================================================
// MSW Handlers
// ============================================================================

export const handlers = [
  // Control panel (v2)
  http.all('*/WRAPI/ControlPanel/api.php', dispatch(controlPanelReplies)),
  http.all('*/WRAPI/Contacts/api.php', dispatch(contactReplies)),

  // Response exports (v3)
  http.post('*/API/v3/responseexports', () => v3Result(fixtures.exportCreated)),

  http.get('*/API/v3/responseexports/:exportId', () => v3Result(fixtures.exportComplete)),

  http.get(
    '*/API/v3/responseexports/:exportId/file',
    () => new HttpResponse(exportArchive, { headers: { 'Content-Type': 'application/zip' } })
  ),
];
