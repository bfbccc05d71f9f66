import { describe, it, expect } from 'vitest';
import { AuthenticationFailure, ConnectionFailure, RESPONSE_DELETED, RemoteOperationError } from '../api/errors.js';
import { isZipArchive } from '../api/operations/exports.js';
import { crc32 } from '../mock/archive.js';
import { MOCK_FILE_BASE, MockQualtrics } from '../mock/index.js';
import { isTerminal, pollExport, requested } from '../workflows/exports.js';

const LIBRARY = 'UR_seedLibrary';

describe('MockQualtrics', () => {
  describe('credentials and connectivity', () => {
    it('returns an empty survey document for a refused token', async () => {
      const mock = new MockQualtrics({ validToken: false });
      await expect(mock.getSurvey('SV_seedCustomer')).resolves.toEqual({ kind: 'empty', reason: 'unauthorized' });
    });

    it('fails other operations with AuthenticationFailure for a refused token', async () => {
      const mock = new MockQualtrics({ validToken: false });
      await expect(mock.getSurveys()).rejects.toBeInstanceOf(AuthenticationFailure);
    });

    it('fails every operation with ConnectionFailure when offline', async () => {
      const mock = new MockQualtrics({ offline: true });
      await expect(mock.getSurvey('SV_seedCustomer')).rejects.toBeInstanceOf(ConnectionFailure);
      await expect(mock.getPanels(LIBRARY)).rejects.toBeInstanceOf(ConnectionFailure);
    });

    it('records every call', async () => {
      const mock = new MockQualtrics();
      await mock.getPanels(LIBRARY);
      await mock.activateSurvey('SV_seedDraft');

      expect(mock.calls).toEqual([
        { operation: 'getPanels', args: [LIBRARY] },
        { operation: 'activateSurvey', args: ['SV_seedDraft'] },
      ]);
    });
  });

  describe('surveys', () => {
    it('serves the seeded survey document', async () => {
      const outcome = await new MockQualtrics().getSurvey('SV_seedCustomer');
      expect(outcome.kind).toBe('data');
      if (outcome.kind === 'data') {
        expect(outcome.data.format).toBe('xml');
        expect(outcome.data.document.startsWith('<SurveyDefinition')).toBe(true);
      }
    });

    it('activates, deactivates, imports and deletes surveys', async () => {
      const mock = new MockQualtrics();
      await mock.activateSurvey('SV_seedDraft');
      const surveyId = await mock.importSurvey({ importFormat: 'QSF', name: 'Imported', activate: false });
      await mock.deleteSurvey('SV_seedCustomer');

      const surveys = await mock.getSurveys();
      expect(surveys.map((s) => [s.SurveyID, s.SurveyStatus])).toEqual([
        ['SV_seedDraft', 'Active'],
        [surveyId, 'Inactive'],
      ]);
      expect(surveyId).toBe('SV_mock1');
    });

    it('reports unknown surveys as a remote error', async () => {
      const error = await new MockQualtrics().deleteSurvey('SV_nope').catch((err: unknown) => err);
      expect(error).toBeInstanceOf(RemoteOperationError);
      expect(error).toMatchObject({ code: 'NOT_FOUND', message: 'Survey SV_nope not found' });
    });
  });

  describe('panels and recipients', () => {
    it('reports a panel without members as empty', async () => {
      const outcome = await new MockQualtrics().getPanel({ libraryId: LIBRARY, panelId: 'ML_seedEmpty' });
      expect(outcome).toEqual({ kind: 'empty', reason: 'no-content' });
    });

    it('imports panel members from CSV using the header row', async () => {
      const mock = new MockQualtrics();
      const panelId = await mock.importPanel({
        libraryId: LIBRARY,
        name: 'Imported',
        csv: 'FirstName,Email\r\nXi,xi@example.com\r\nYu,yu@example.com\r\n',
        columnHeaders: true,
      });

      expect(panelId).toBe('ML_mock3');
      expect(await mock.getPanelMemberCount({ libraryId: LIBRARY, panelId })).toBe(2);
      const outcome = await mock.getPanel({ libraryId: LIBRARY, panelId, numberOfRecords: 1 });
      expect(outcome).toEqual({
        kind: 'data',
        data: [
          {
            RecipientID: 'MLRP_mock1',
            Email: 'xi@example.com',
            FirstName: 'Xi',
            LastName: undefined,
            ExternalDataReference: undefined,
            EmbeddedData: {},
          },
        ],
      });
    });

    it('imports JSON contacts into a new panel', async () => {
      const mock = new MockQualtrics();
      const panelId = await mock.importJsonPanel({
        libraryId: LIBRARY,
        name: 'From JSON',
        contacts: [{ Email: 'zo@example.com', LastName: 'Example' }],
      });

      const outcome = await mock.getPanel({ libraryId: LIBRARY, panelId });
      expect(outcome.kind === 'data' && outcome.data[0]).toMatchObject({ Email: 'zo@example.com', LastName: 'Example' });
    });

    it('adds, reads and removes a recipient', async () => {
      const mock = new MockQualtrics();
      const recipientId = await mock.addRecipient({
        libraryId: LIBRARY,
        panelId: 'ML_seedEmpty',
        firstName: 'Ro',
        lastName: 'Example',
        email: 'ro@example.com',
        embeddedData: { plan: 'pro' },
      });

      expect(await mock.getRecipient({ libraryId: LIBRARY, recipientId })).toMatchObject({
        RecipientID: recipientId,
        Email: 'ro@example.com',
        EmbeddedData: { plan: 'pro' },
      });

      await mock.removeRecipient({ libraryId: LIBRARY, panelId: 'ML_seedEmpty', recipientId });
      await expect(mock.getRecipient({ libraryId: LIBRARY, recipientId })).rejects.toBeInstanceOf(RemoteOperationError);
    });

    it('keeps panels of other libraries apart', async () => {
      const mock = new MockQualtrics();
      expect(await mock.getPanels('UR_other')).toEqual([]);
      await expect(mock.getPanelMemberCount({ libraryId: 'UR_other', panelId: 'ML_seedPilot' })).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });
  });

  describe('responses', () => {
    it('reports a missing response as deleted', async () => {
      const error = await new MockQualtrics()
        .getResponse({ surveyId: 'SV_seedCustomer', responseId: 'R_gone' })
        .catch((err: unknown) => err);

      expect(error).toMatchObject({
        code: RESPONSE_DELETED,
        message: 'Qualtrics error: ResponseID R_gone not in response (probably deleted)',
      });
    });

    it('does not find responses named after object prototype members', async () => {
      const mock = new MockQualtrics();
      const ref = { surveyId: 'SV_seedCustomer', responseId: 'toString' };

      await expect(mock.getResponse(ref)).rejects.toMatchObject({ code: RESPONSE_DELETED });
      await expect(mock.getSingleResponseHTML(ref)).rejects.toMatchObject({ message: 'Response toString not found' });
      await expect(mock.updateResponseEmbeddedData({ ...ref, embeddedData: { cohort: 'spring' } })).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });

    it('imports response records and updates their embedded data', async () => {
      const mock = new MockQualtrics();
      await mock.importResponsesAsDict({
        surveyId: 'SV_seedDraft',
        responses: [{ ResponseID: 'R_new', Q1: 2, Finished: true }],
      });
      await mock.updateResponseEmbeddedData({
        surveyId: 'SV_seedDraft',
        responseId: 'R_new',
        embeddedData: { cohort: 'spring' },
      });

      expect(await mock.getResponse({ surveyId: 'SV_seedDraft', responseId: 'R_new' })).toEqual({
        ResponseID: 'R_new',
        Q1: '2',
        Finished: '1',
        cohort: 'spring',
      });
    });

    it('pages legacy response data', async () => {
      const outcome = await new MockQualtrics().getLegacyResponseData({
        surveyId: 'SV_seedCustomer',
        lastResponseId: 'R_seedFirst',
      });
      expect(outcome.kind === 'data' && Object.keys(outcome.data)).toEqual(['R_seedSecond']);
    });
  });

  describe('distributions', () => {
    it('sends to a panel member and lists the distribution', async () => {
      const mock = new MockQualtrics();
      const distributionId = await mock.sendSurveyToIndividual({
        surveyId: 'SV_seedCustomer',
        messageLibraryId: LIBRARY,
        panelId: 'ML_seedPilot',
        panelLibraryId: LIBRARY,
        recipientId: 'MLRP_seedAda',
        sendDate: '2024-05-01 09:00:00',
        fromEmail: 'surveys@example.com',
        fromName: 'Surveys',
        subject: 'Quick question',
        messageId: 'MS_test',
      });

      expect(await mock.getDistributions({ surveyId: 'SV_seedCustomer' })).toEqual({
        Distributions: [
          {
            EmailDistributionID: distributionId,
            SurveyID: 'SV_seedCustomer',
            PanelID: 'ML_seedPilot',
            RecipientID: 'MLRP_seedAda',
            Subject: 'Quick question',
            SendDate: '2024-05-01 09:00:00',
          },
        ],
      });
    });
  });

  describe('response exports', () => {
    it('reports inProgress for the configured polls, then complete on every poll after', async () => {
      const mock = new MockQualtrics({ exportPolls: 2 });
      const { id } = await mock.createResponseExport({ format: 'csv', surveyId: 'SV_seedCustomer' });

      expect(await mock.getResponseExportProgress(id)).toEqual({ status: 'inProgress', percentComplete: 33 });
      expect(await mock.getResponseExportProgress(id)).toEqual({ status: 'inProgress', percentComplete: 67 });
      const complete = { status: 'complete', percentComplete: 100, fileUrl: `${MOCK_FILE_BASE}/${id}/file` };
      expect(await mock.getResponseExportProgress(id)).toEqual(complete);
      expect(await mock.getResponseExportProgress(id)).toEqual(complete);
    });

    it('refuses to download before the export completes', async () => {
      const mock = new MockQualtrics();
      const { id } = await mock.createResponseExport({ format: 'csv', surveyId: 'SV_seedCustomer' });

      await expect(mock.getResponseExportFile(id)).rejects.toMatchObject({ code: 'EXPORT_NOT_READY' });
    });

    it('serves a zip archive once the export is complete', async () => {
      const mock = new MockQualtrics({ exportPolls: 0 });
      const { id } = await mock.createResponseExport({ format: 'csv', surveyId: 'SV_seedCustomer' });
      let state = requested(id);
      while (!isTerminal(state)) {
        state = await pollExport(mock, state);
      }

      expect(state.phase).toBe('complete');
      const bytes = await mock.getResponseExportFile(state.phase === 'complete' ? state.fileUrl : id);
      expect(isZipArchive(bytes)).toBe(true);
      expect(new TextDecoder().decode(bytes)).toContain('ResponseID,Finished,Q1\r\nR_seedFirst,1,5\r\nR_seedSecond,1,3\r\n');
    });
  });

  describe('contacts', () => {
    it('removes contacts from a list', async () => {
      const mock = new MockQualtrics();
      await mock.removeContact({ libraryId: LIBRARY, listId: 'ML_seedContacts', recipientId: 'MLRP_seedBo' });

      const outcome = await mock.getListContacts({ libraryId: LIBRARY, listId: 'ML_seedContacts' });
      expect(outcome.kind === 'data' && outcome.data.map((c) => c.RecipientID)).toEqual(['MLRP_seedCy']);
    });
  });

  describe('subscriptions', () => {
    it('lists created subscriptions', async () => {
      const mock = new MockQualtrics();
      const created = await mock.subscribe({
        name: 'Completed responses',
        publicationUrl: 'https://hooks.example.com/qualtrics',
        topics: 'surveyengine.completedResponse.SV_seedCustomer',
      });

      expect(await mock.getAllSubscriptions()).toEqual({ Subscriptions: [created] });
    });
  });
});

describe('zip archive', () => {
  it('computes the standard CRC-32', () => {
    expect(crc32(new TextEncoder().encode('123456789'))).toBe(0xcbf43926);
  });
});
