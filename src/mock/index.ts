/**
 * In-memory Qualtrics.
 *
 * Implements the same operation surface as the HTTP client, with the same
 * outcome variants and error classes, so callers can be exercised without a
 * network. Every call is recorded in `calls`.
 */

import { importColumns } from '../api/operations/panels.js';
import { CONTACT_HEADERS, parseCsv, toCsv } from '../api/csv.js';
import type { ColumnIndexes, ContactColumn } from '../api/csv.js';
import { AuthenticationFailure, ConnectionFailure, RESPONSE_DELETED, RemoteOperationError } from '../api/errors.js';
import { data, empty } from '../api/outcome.js';
import type { Outcome } from '../api/outcome.js';
import type { Passthrough } from '../api/params.js';
import type {
  AddRecipientParams,
  Contact,
  CreateDistributionParams,
  CreateExportParams,
  CreatePanelParams,
  ExportFormat,
  ExportHandle,
  ExportProgress,
  GetDistributionsParams,
  GetListContactsParams,
  GetPanelParams,
  ImportContactsParams,
  ImportJsonPanelParams,
  ImportPanelParams,
  ImportResponseRecordsParams,
  ImportResponsesParams,
  ImportSurveyParams,
  LegacyResponse,
  LegacyResponseQuery,
  PanelMember,
  PanelRef,
  PanelSummary,
  QualtricsApi,
  Recipient,
  RecipientRef,
  RemoveContactParams,
  RemoveRecipientParams,
  ResponseRef,
  SendReminderParams,
  SendSurveyToIndividualParams,
  SendSurveyToPanelParams,
  SubscribeParams,
  SurveyDocument,
  SurveySummary,
  UpdateEmbeddedDataParams,
} from '../api/types.js';
import { zipSingleFile } from './archive.js';
import { defaultSeed } from './fixtures.js';
import type { MockSeed, SeedSurvey } from './fixtures.js';

export { defaultSeed } from './fixtures.js';
export type { MockSeed, SeedList, SeedPanel, SeedSurvey } from './fixtures.js';

export const MOCK_FILE_BASE = 'https://mock.qualtrics.test/API/v3/responseexports';

export type OperationName = keyof QualtricsApi;

export interface MockCall {
  operation: OperationName;
  args: unknown[];
}

export interface MockOptions {
  /** When false, getSurvey is empty and every other operation fails authentication. */
  validToken?: boolean;
  /** Every operation fails with a ConnectionFailure. */
  offline?: boolean;
  /** Number of `inProgress` polls an export reports before it completes. */
  exportPolls?: number;
  seed?: MockSeed;
}

interface MemberGroup {
  libraryId: string;
  id: string;
  name: string;
  category?: string;
  members: PanelMember[];
}

interface DistributionRecord {
  EmailDistributionID: string;
  SurveyID: string;
  [field: string]: unknown;
}

interface ExportJob {
  surveyId: string;
  format: ExportFormat;
  polls: number;
  complete: boolean;
}

function copy<T>(value: T): T {
  return structuredClone(value);
}

function notFound(entity: string, id: string): RemoteOperationError {
  return new RemoteOperationError(200, 'OK', 'NOT_FOUND', `${entity} ${id} not found`);
}

/** Members after `lastRecipientId`, at most `numberOfRecords` of them. */
function page<T extends { RecipientID: string }>(
  members: T[],
  lastRecipientId: string | undefined,
  numberOfRecords: number | undefined
): T[] {
  const start = lastRecipientId ? members.findIndex((m) => m.RecipientID === lastRecipientId) + 1 : 0;
  const rest = members.slice(start);
  return numberOfRecords === undefined ? rest : rest.slice(0, numberOfRecords);
}

export class MockQualtrics implements QualtricsApi {
  readonly calls: MockCall[] = [];

  private readonly validToken: boolean;
  private readonly offline: boolean;
  private readonly exportPolls: number;

  private readonly surveys = new Map<string, SeedSurvey>();
  private readonly panels = new Map<string, MemberGroup>();
  private readonly lists = new Map<string, MemberGroup>();
  private readonly distributions = new Map<string, DistributionRecord>();
  private readonly exports = new Map<string, ExportJob>();
  private readonly subscriptions = new Map<string, Record<string, unknown>>();
  private sequence = 0;

  constructor(options: MockOptions = {}) {
    this.validToken = options.validToken ?? true;
    this.offline = options.offline ?? false;
    this.exportPolls = options.exportPolls ?? 1;

    const seed = copy(options.seed ?? defaultSeed);
    for (const survey of seed.surveys ?? []) {
      this.surveys.set(survey.summary.SurveyID, survey);
    }
    for (const panel of seed.panels ?? []) {
      this.panels.set(panel.panelId, {
        libraryId: panel.libraryId,
        id: panel.panelId,
        name: panel.name,
        category: panel.category,
        members: panel.members,
      });
    }
    for (const list of seed.lists ?? []) {
      this.lists.set(list.listId, { libraryId: list.libraryId, id: list.listId, name: list.name, members: list.contacts });
    }
  }

  // ==========================================================================
  // Bookkeeping
  // ==========================================================================

  private nextId(prefix: string): string {
    this.sequence += 1;
    return `${prefix}_mock${this.sequence}`;
  }

  /** Records the call and reports whether the token is accepted. */
  private gate(operation: OperationName, args: unknown[]): boolean {
    this.calls.push({ operation, args });
    if (this.offline) {
      throw new ConnectionFailure('Unable to connect to server: mock is offline');
    }
    return this.validToken;
  }

  private enter(operation: OperationName, ...args: unknown[]): void {
    if (!this.gate(operation, args)) {
      throw new AuthenticationFailure(401, 'Unauthorized');
    }
  }

  private storedResponse(surveyId: string, responseId: string): LegacyResponse | undefined {
    const { responses } = this.survey(surveyId);
    return Object.hasOwn(responses, responseId) ? responses[responseId] : undefined;
  }

  private survey(surveyId: string): SeedSurvey {
    const survey = this.surveys.get(surveyId);
    if (!survey) throw notFound('Survey', surveyId);
    return survey;
  }

  private group(groups: Map<string, MemberGroup>, entity: string, libraryId: string, id: string): MemberGroup {
    const group = groups.get(id);
    if (!group || group.libraryId !== libraryId) throw notFound(entity, id);
    return group;
  }

  private membersFromCsv(csv: string, columnHeaders: boolean | undefined, columns: ColumnIndexes | undefined): PanelMember[] {
    const records = parseCsv(csv);
    const positions = importColumns(csv, columnHeaders, columns);
    const rows = columnHeaders ? records.slice(1) : records;
    const cell = (row: string[], column: ContactColumn): string | undefined => {
      const position = positions[column];
      return position === undefined ? undefined : row[position - 1];
    };
    return rows.map((row) => ({
      RecipientID: this.nextId('MLRP'),
      Email: cell(row, 'Email'),
      FirstName: cell(row, 'FirstName'),
      LastName: cell(row, 'LastName'),
      ExternalDataReference: cell(row, 'ExternalRef'),
      EmbeddedData: {},
    }));
  }

  private importMembers(
    groups: Map<string, MemberGroup>,
    entity: string,
    prefix: string,
    target: { libraryId: string; name: string; id?: string },
    members: PanelMember[]
  ): string {
    if (target.id) {
      this.group(groups, entity, target.libraryId, target.id).members.push(...members);
      return target.id;
    }
    const id = this.nextId(prefix);
    groups.set(id, { libraryId: target.libraryId, id, name: target.name, members });
    return id;
  }

  private addResponsesFromCsv(survey: SeedSurvey, csv: string): void {
    const [headers = [], ...rows] = parseCsv(csv);
    for (const row of rows) {
      const response: Record<string, string> = {};
      headers.forEach((header, i) => {
        response[header] = row[i] ?? '';
      });
      const responseId = response.ResponseID || this.nextId('R');
      survey.responses[responseId] = { ...response, ResponseID: responseId };
    }
  }

  private distribution(surveyId: string, fields: Record<string, unknown>): string {
    const id = this.nextId('EMD');
    this.distributions.set(id, { ...fields, EmailDistributionID: id, SurveyID: surveyId });
    return id;
  }

  // ==========================================================================
  // Panels
  // ==========================================================================

  async createPanel(params: CreatePanelParams): Promise<string> {
    this.enter('createPanel', params);
    const id = this.nextId('ML');
    this.panels.set(id, { libraryId: params.libraryId, id, name: params.name, category: params.category, members: [] });
    return id;
  }

  async deletePanel(params: PanelRef): Promise<void> {
    this.enter('deletePanel', params);
    this.group(this.panels, 'Panel', params.libraryId, params.panelId);
    this.panels.delete(params.panelId);
  }

  async getPanelMemberCount(params: PanelRef): Promise<number> {
    this.enter('getPanelMemberCount', params);
    return this.group(this.panels, 'Panel', params.libraryId, params.panelId).members.length;
  }

  async getPanels(libraryId: string): Promise<PanelSummary[]> {
    this.enter('getPanels', libraryId);
    return [...this.panels.values()]
      .filter((panel) => panel.libraryId === libraryId)
      .map((panel) => ({ LibraryID: panel.libraryId, PanelID: panel.id, Name: panel.name, Category: panel.category }));
  }

  async getPanel(params: GetPanelParams): Promise<Outcome<PanelMember[]>> {
    this.enter('getPanel', params);
    const panel = this.group(this.panels, 'Panel', params.libraryId, params.panelId);
    const members = page(panel.members, params.lastRecipientId, params.numberOfRecords);
    return members.length === 0 ? empty('no-content') : data(copy(members));
  }

  async importPanel(params: ImportPanelParams): Promise<string> {
    this.enter('importPanel', params);
    const members = this.membersFromCsv(params.csv, params.columnHeaders, params.columns);
    return this.importMembers(
      this.panels,
      'Panel',
      'ML',
      { libraryId: params.libraryId, name: params.name, id: params.panelId },
      members
    );
  }

  async importJsonPanel(params: ImportJsonPanelParams): Promise<string> {
    this.enter('importJsonPanel', params);
    const csv = toCsv(params.contacts, params.headers ?? [...CONTACT_HEADERS]);
    const members = this.membersFromCsv(csv, true, undefined);
    return this.importMembers(this.panels, 'Panel', 'ML', { libraryId: params.libraryId, name: params.name }, members);
  }

  // ==========================================================================
  // Recipients
  // ==========================================================================

  async addRecipient(params: AddRecipientParams): Promise<string> {
    this.enter('addRecipient', params);
    const panel = this.group(this.panels, 'Panel', params.libraryId, params.panelId);
    const recipientId = this.nextId('MLRP');
    panel.members.push({
      RecipientID: recipientId,
      FirstName: params.firstName,
      LastName: params.lastName,
      Email: params.email,
      ExternalDataReference: params.externalDataRef,
      Language: params.language,
      EmbeddedData: { ...params.embeddedData },
    });
    return recipientId;
  }

  async getRecipient(params: RecipientRef): Promise<Recipient> {
    this.enter('getRecipient', params);
    for (const panel of this.panels.values()) {
      if (panel.libraryId !== params.libraryId) continue;
      const member = panel.members.find((m) => m.RecipientID === params.recipientId);
      if (member) return copy(member);
    }
    throw notFound('Recipient', params.recipientId);
  }

  async removeRecipient(params: RemoveRecipientParams): Promise<void> {
    this.enter('removeRecipient', params);
    const panel = this.group(this.panels, 'Panel', params.libraryId, params.panelId);
    const index = panel.members.findIndex((m) => m.RecipientID === params.recipientId);
    if (index < 0) throw notFound('Recipient', params.recipientId);
    panel.members.splice(index, 1);
  }

  // ==========================================================================
  // Distributions
  // ==========================================================================

  async sendSurveyToIndividual(params: SendSurveyToIndividualParams): Promise<string> {
    this.enter('sendSurveyToIndividual', params);
    this.survey(params.surveyId);
    const panel = this.group(this.panels, 'Panel', params.panelLibraryId, params.panelId);
    if (!panel.members.some((m) => m.RecipientID === params.recipientId)) {
      throw notFound('Recipient', params.recipientId);
    }
    return this.distribution(params.surveyId, {
      PanelID: params.panelId,
      RecipientID: params.recipientId,
      Subject: params.subject,
      SendDate: params.sendDate,
    });
  }

  async sendSurveyToPanel(params: SendSurveyToPanelParams): Promise<string> {
    this.enter('sendSurveyToPanel', params);
    this.survey(params.surveyId);
    this.group(this.panels, 'Panel', params.panelLibraryId, params.panelId);
    return this.distribution(params.surveyId, {
      PanelID: params.panelId,
      LinkType: params.linkType ?? 'Individual',
      Subject: params.subject,
      SendDate: params.sendDate,
    });
  }

  async sendReminder(params: SendReminderParams): Promise<string> {
    this.enter('sendReminder', params);
    const parent = this.distributions.get(params.parentEmailDistributionId);
    if (!parent) throw notFound('Distribution', params.parentEmailDistributionId);
    return this.distribution(parent.SurveyID, {
      ParentEmailDistributionID: parent.EmailDistributionID,
      Subject: params.subject,
      SendDate: params.sendDate,
    });
  }

  async createDistribution(params: CreateDistributionParams): Promise<string> {
    this.enter('createDistribution', params);
    this.survey(params.surveyId);
    this.group(this.panels, 'Panel', params.panelLibraryId, params.panelId);
    return this.distribution(params.surveyId, { PanelID: params.panelId, Description: params.description });
  }

  async getDistributions(params: GetDistributionsParams): Promise<Record<string, unknown>> {
    this.enter('getDistributions', params);
    const distributions = [...this.distributions.values()].filter(
      (d) =>
        (!params.surveyId || d.SurveyID === params.surveyId) &&
        (!params.distributionId || d.EmailDistributionID === params.distributionId)
    );
    return { Distributions: copy(distributions) };
  }

  // ==========================================================================
  // Surveys
  // ==========================================================================

  async getSurveys(extra?: Passthrough): Promise<SurveySummary[]> {
    this.enter('getSurveys', extra);
    return [...this.surveys.values()].map((survey) => copy(survey.summary));
  }

  /** With a refused token the document is empty rather than an error. */
  async getSurvey(surveyId: string): Promise<Outcome<SurveyDocument>> {
    if (!this.gate('getSurvey', [surveyId])) {
      return empty('unauthorized');
    }
    return data<SurveyDocument>({ format: 'xml', document: this.survey(surveyId).document });
  }

  async importSurvey(params: ImportSurveyParams): Promise<string> {
    this.enter('importSurvey', params);
    const surveyId = this.nextId('SV');
    this.surveys.set(surveyId, {
      summary: {
        SurveyID: surveyId,
        SurveyName: params.name,
        SurveyStatus: params.activate ? 'Active' : 'Inactive',
        SurveyOwnerID: params.ownerId,
      },
      document: params.fileContents ?? `<SurveyDefinition SurveyID="${surveyId}"/>`,
      responses: {},
    });
    return surveyId;
  }

  async deleteSurvey(surveyId: string): Promise<void> {
    this.enter('deleteSurvey', surveyId);
    this.survey(surveyId);
    this.surveys.delete(surveyId);
  }

  async activateSurvey(surveyId: string): Promise<void> {
    this.enter('activateSurvey', surveyId);
    this.survey(surveyId).summary.SurveyStatus = 'Active';
  }

  async deactivateSurvey(surveyId: string): Promise<void> {
    this.enter('deactivateSurvey', surveyId);
    this.survey(surveyId).summary.SurveyStatus = 'Inactive';
  }

  // ==========================================================================
  // Responses
  // ==========================================================================

  async getLegacyResponseData(query: LegacyResponseQuery): Promise<Outcome<Record<string, LegacyResponse>>> {
    this.enter('getLegacyResponseData', query);
    let entries = Object.entries(this.survey(query.surveyId).responses);
    if (query.responseId) {
      entries = entries.filter(([id]) => id === query.responseId);
    }
    if (query.lastResponseId) {
      entries = entries.slice(entries.findIndex(([id]) => id === query.lastResponseId) + 1);
    }
    if (query.limit !== undefined) {
      entries = entries.slice(0, query.limit);
    }
    return entries.length === 0 ? empty('no-content') : data(copy(Object.fromEntries(entries)));
  }

  async getResponse(params: ResponseRef): Promise<LegacyResponse> {
    this.enter('getResponse', params);
    const response = this.storedResponse(params.surveyId, params.responseId);
    if (!response) {
      throw new RemoteOperationError(
        200,
        'OK',
        RESPONSE_DELETED,
        `Qualtrics error: ResponseID ${params.responseId} not in response (probably deleted)`
      );
    }
    return copy(response);
  }

  /** Only inline file contents are loaded; a file URL is accepted and ignored. */
  async importResponses(params: ImportResponsesParams): Promise<void> {
    this.enter('importResponses', params);
    const survey = this.survey(params.surveyId);
    if (params.fileContents) {
      this.addResponsesFromCsv(survey, params.fileContents);
    }
  }

  async importResponsesAsDict(params: ImportResponseRecordsParams): Promise<void> {
    this.enter('importResponsesAsDict', params);
    if (params.responses.length === 0) return;
    const survey = this.survey(params.surveyId);
    this.addResponsesFromCsv(survey, toCsv(params.responses, Object.keys(params.responses[0])));
  }

  async updateResponseEmbeddedData(params: UpdateEmbeddedDataParams): Promise<void> {
    this.enter('updateResponseEmbeddedData', params);
    const response = this.storedResponse(params.surveyId, params.responseId);
    if (!response) throw notFound('Response', params.responseId);
    Object.assign(response, params.embeddedData);
  }

  async getSingleResponseHTML(params: ResponseRef): Promise<string> {
    this.enter('getSingleResponseHTML', params);
    const response = this.storedResponse(params.surveyId, params.responseId);
    if (!response) throw notFound('Response', params.responseId);
    const rows = Object.entries(response).map(([key, value]) => `<tr><th>${key}</th><td>${String(value)}</td></tr>`);
    return `<table>${rows.join('')}</table>`;
  }

  // ==========================================================================
  // Response Exports
  // ==========================================================================

  async createResponseExport(params: CreateExportParams): Promise<ExportHandle> {
    this.enter('createResponseExport', params);
    this.survey(params.surveyId);
    const id = this.nextId('ES');
    this.exports.set(id, { surveyId: params.surveyId, format: params.format, polls: 0, complete: false });
    return { id };
  }

  /** Reports `inProgress` for the configured number of polls, then `complete` on every poll after. */
  async getResponseExportProgress(exportId: string): Promise<ExportProgress> {
    this.enter('getResponseExportProgress', exportId);
    const job = this.exports.get(exportId);
    if (!job) throw notFound('Export', exportId);

    if (!job.complete && job.polls < this.exportPolls) {
      job.polls += 1;
      return { status: 'inProgress', percentComplete: Math.round((job.polls * 100) / (this.exportPolls + 1)) };
    }
    job.complete = true;
    return { status: 'complete', percentComplete: 100, fileUrl: `${MOCK_FILE_BASE}/${exportId}/file` };
  }

  async getResponseExportFile(exportIdOrUrl: string): Promise<Uint8Array> {
    this.enter('getResponseExportFile', exportIdOrUrl);
    const match = /\/responseexports\/([^/]+)\/file$/.exec(exportIdOrUrl);
    const exportId = match ? decodeURIComponent(match[1]) : exportIdOrUrl;
    const job = this.exports.get(exportId);
    if (!job) throw notFound('Export', exportId);
    if (!job.complete) {
      throw new RemoteOperationError(200, 'OK', 'EXPORT_NOT_READY', `Export ${exportId} is not complete`);
    }

    const survey = this.surveys.get(job.surveyId);
    const responses = survey ? Object.values(survey.responses) : [];
    if (job.format === 'json') {
      return new Uint8Array(zipSingleFile(`${job.surveyId}.json`, JSON.stringify({ responses })));
    }
    const headers = [...new Set(responses.flatMap((response) => Object.keys(response)))];
    const rows = responses.map((response) =>
      Object.fromEntries(Object.entries(response).map(([key, value]) => [key, String(value ?? '')]))
    );
    return new Uint8Array(zipSingleFile(`${job.surveyId}.csv`, toCsv(rows, headers)));
  }

  // ==========================================================================
  // Contacts
  // ==========================================================================

  async importContacts(params: ImportContactsParams): Promise<string> {
    this.enter('importContacts', params);
    const contacts = this.membersFromCsv(params.csv, params.columnHeaders, params.columns);
    return this.importMembers(
      this.lists,
      'List',
      'ML',
      { libraryId: params.libraryId, name: params.name, id: params.listId },
      contacts
    );
  }

  async getListContacts(params: GetListContactsParams): Promise<Outcome<Contact[]>> {
    this.enter('getListContacts', params);
    const list = this.group(this.lists, 'List', params.libraryId, params.listId);
    const contacts = page(list.members, params.lastRecipientId, params.numberOfRecords);
    return contacts.length === 0 ? empty('no-content') : data(copy(contacts));
  }

  async removeContact(params: RemoveContactParams): Promise<void> {
    this.enter('removeContact', params);
    const list = this.group(this.lists, 'List', params.libraryId, params.listId);
    const index = list.members.findIndex((m) => m.RecipientID === params.recipientId);
    if (index < 0) throw notFound('Contact', params.recipientId);
    list.members.splice(index, 1);
  }

  // ==========================================================================
  // Subscriptions
  // ==========================================================================

  async getAllSubscriptions(): Promise<Record<string, unknown>> {
    this.enter('getAllSubscriptions');
    return { Subscriptions: copy([...this.subscriptions.values()]) };
  }

  async subscribe(params: SubscribeParams): Promise<Record<string, unknown>> {
    this.enter('subscribe', params);
    const subscription = {
      SubscriptionID: this.nextId('SUB'),
      Name: params.name,
      PublicationURL: params.publicationUrl,
      Topics: params.topics,
      Encrypt: params.encrypt ?? false,
    };
    this.subscriptions.set(subscription.SubscriptionID, subscription);
    return { ...subscription };
  }
}
