/**
 * Default state for the mock collaborator.
 */

import type { LegacyResponse, PanelMember, SurveySummary } from '../api/types.js';

export interface SeedSurvey {
  summary: SurveySummary;
  document: string;
  responses: Record<string, LegacyResponse>;
}

export interface SeedPanel {
  libraryId: string;
  panelId: string;
  name: string;
  category?: string;
  members: PanelMember[];
}

export interface SeedList {
  libraryId: string;
  listId: string;
  name: string;
  contacts: PanelMember[];
}

export interface MockSeed {
  surveys?: SeedSurvey[];
  panels?: SeedPanel[];
  lists?: SeedList[];
}

export const defaultSeed: MockSeed = {
  surveys: [
    {
      summary: {
        SurveyID: 'SV_seedCustomer',
        SurveyName: 'Customer Satisfaction',
        SurveyStatus: 'Active',
        SurveyOwnerID: 'UR_seedOwner',
        SurveyCreationDate: '2024-01-15 09:30:00',
      },
      document: '<SurveyDefinition SurveyID="SV_seedCustomer"><SurveyName>Customer Satisfaction</SurveyName></SurveyDefinition>',
      responses: {
        R_seedFirst: { ResponseID: 'R_seedFirst', Finished: '1', Q1: '5' },
        R_seedSecond: { ResponseID: 'R_seedSecond', Finished: '1', Q1: '3' },
      },
    },
    {
      summary: {
        SurveyID: 'SV_seedDraft',
        SurveyName: 'Onboarding Draft',
        SurveyStatus: 'Inactive',
        SurveyOwnerID: 'UR_seedOwner',
        SurveyCreationDate: '2024-02-01 14:00:00',
      },
      document: '<SurveyDefinition SurveyID="SV_seedDraft"><SurveyName>Onboarding Draft</SurveyName></SurveyDefinition>',
      responses: {},
    },
  ],
  panels: [
    {
      libraryId: 'UR_seedLibrary',
      panelId: 'ML_seedPilot',
      name: 'Pilot Group',
      members: [
        {
          RecipientID: 'MLRP_seedAda',
          FirstName: 'Ada',
          LastName: 'Example',
          Email: 'ada@example.com',
          ExternalDataReference: 'ext-1',
          Language: 'EN',
          EmbeddedData: {},
        },
      ],
    },
    {
      libraryId: 'UR_seedLibrary',
      panelId: 'ML_seedEmpty',
      name: 'Empty Group',
      members: [],
    },
  ],
  lists: [
    {
      libraryId: 'UR_seedLibrary',
      listId: 'ML_seedContacts',
      name: 'Newsletter',
      contacts: [
        { RecipientID: 'MLRP_seedBo', FirstName: 'Bo', LastName: 'Example', Email: 'bo@example.com' },
        { RecipientID: 'MLRP_seedCy', FirstName: 'Cy', LastName: 'Example', Email: 'cy@example.com' },
      ],
    },
  ],
};
