/**
 * Operation surface shared by the HTTP client and the mock.
 *
 * Parameter names are camelCase; each operation maps them onto the
 * platform's wire names.
 */

import type { ColumnIndexes, CsvRow } from './csv.js';
import type { Outcome } from './outcome.js';
import type { EmbeddedData, Passthrough } from './params.js';
import type {
  Contact,
  ExportFormat,
  LegacyResponse,
  PanelMember,
  PanelSummary,
  Recipient,
  SurveySummary,
} from './schemas/index.js';

export type {
  Contact,
  ExportFormat,
  LegacyResponse,
  PanelMember,
  PanelSummary,
  Recipient,
  SurveySummary,
} from './schemas/index.js';

interface WithExtra {
  /** Additional API parameters, sent under their wire names. */
  extra?: Passthrough;
}

// ============================================================================
// Panels & Recipients
// ============================================================================

export interface PanelRef extends WithExtra {
  libraryId: string;
  panelId: string;
}

export interface CreatePanelParams extends WithExtra {
  libraryId: string;
  name: string;
  category?: string;
}

export interface GetPanelParams extends PanelRef {
  /** Embedded data keys to export. */
  embeddedData?: string[];
  lastRecipientId?: string;
  numberOfRecords?: number;
  exportLanguage?: boolean;
  unsubscribed?: boolean;
  subscribed?: boolean;
}

export interface ImportPanelParams extends WithExtra {
  libraryId: string;
  name: string;
  /** CSV document, comma separated with `"` for encapsulation. */
  csv: string;
  /** First row holds column names; contact columns are located from it. */
  columnHeaders?: boolean;
  /** Explicit 1-based column positions; these win over discovered ones. */
  columns?: ColumnIndexes;
  /** Append to this panel instead of creating one. */
  panelId?: string;
}

export type ContactRecord = CsvRow;

export interface ImportJsonPanelParams extends WithExtra {
  libraryId: string;
  name: string;
  contacts: ContactRecord[];
  headers?: string[];
}

export interface AddRecipientParams extends PanelRef {
  firstName: string;
  lastName: string;
  email: string;
  externalDataRef?: string;
  language?: string;
  embeddedData?: EmbeddedData;
}

export interface RecipientRef extends WithExtra {
  libraryId: string;
  recipientId: string;
}

export interface RemoveRecipientParams extends PanelRef {
  recipientId: string;
}

// ============================================================================
// Distributions
// ============================================================================

export type LinkType = 'Individual' | 'Multiple' | 'Anonymous';

interface MailingParams extends WithExtra {
  sendDate: string;
  fromEmail: string;
  fromName: string;
  subject: string;
  messageId: string;
  sentFromAddress?: string;
}

export interface SendSurveyToIndividualParams extends MailingParams {
  surveyId: string;
  messageLibraryId: string;
  panelId: string;
  panelLibraryId: string;
  recipientId: string;
}

export interface SendSurveyToPanelParams extends MailingParams {
  surveyId: string;
  messageLibraryId: string;
  panelId: string;
  panelLibraryId: string;
  linkType?: LinkType;
}

export interface SendReminderParams extends MailingParams {
  parentEmailDistributionId: string;
  libraryId: string;
}

export interface CreateDistributionParams extends WithExtra {
  surveyId: string;
  panelId: string;
  description: string;
  panelLibraryId: string;
}

export interface GetDistributionsParams extends WithExtra {
  surveyId?: string;
  distributionId?: string;
  libraryId?: string;
}

// ============================================================================
// Surveys
// ============================================================================

export interface SurveyDocument {
  format: 'xml';
  document: string;
}

export type ImportFormat = 'TXT' | 'QSF' | 'DOC' | 'MSQ';

export interface ImportSurveyParams extends WithExtra {
  importFormat: ImportFormat;
  name: string;
  activate?: boolean;
  /** Import the survey file from this URL. */
  url?: string;
  /** Survey file contents, posted as multipart form data. */
  fileContents?: string;
  ownerId?: string;
}

// ============================================================================
// Responses
// ============================================================================

export interface LegacyResponseQuery extends WithExtra {
  surveyId: string;
  lastResponseId?: string;
  limit?: number;
  responseId?: string;
  responseSetId?: string;
  subgroupId?: string;
  startDate?: string;
  endDate?: string;
  questions?: string[];
  labels?: boolean;
  exportTags?: boolean;
  exportQuestionIds?: boolean;
  localTime?: boolean;
  unansweredRecode?: string;
  panelId?: string;
  responsesInProgress?: boolean;
  locationData?: boolean;
}

export interface ResponseRef extends WithExtra {
  surveyId: string;
  responseId: string;
}

interface ImportResponseOptions extends WithExtra {
  surveyId: string;
  responseSetId?: string;
  delimiter?: string;
  enclosure?: string;
  ignoreValidation?: boolean;
  decimalFormat?: ',' | '.';
}

export interface ImportResponsesParams extends ImportResponseOptions {
  fileUrl?: string;
  fileContents?: string;
}

export interface ImportResponseRecordsParams extends ImportResponseOptions {
  responses: CsvRow[];
}

export interface UpdateEmbeddedDataParams extends ResponseRef {
  embeddedData: EmbeddedData;
}

// ============================================================================
// Response Exports
// ============================================================================

export interface CreateExportParams {
  format: ExportFormat;
  surveyId: string;
  lastResponseId?: string;
  startDate?: string;
  endDate?: string;
  limit?: number;
  includedQuestionIds?: string[];
  useLabels?: boolean;
  decimalSeparator?: ',' | '.';
  seenUnansweredRecode?: string;
  useLocalTime?: boolean;
}

export interface ExportHandle {
  id: string;
}

export type ExportProgress =
  | { status: 'inProgress'; percentComplete: number }
  | { status: 'complete'; percentComplete: 100; fileUrl: string }
  | { status: 'failed'; percentComplete: number; reason: string };

// ============================================================================
// Contacts & Subscriptions
// ============================================================================

export interface ImportContactsParams extends WithExtra {
  libraryId: string;
  name: string;
  csv: string;
  columnHeaders?: boolean;
  columns?: ColumnIndexes;
  /** Append to this list instead of creating one. */
  listId?: string;
}

export interface ListRef extends WithExtra {
  libraryId: string;
  listId: string;
}

export interface GetListContactsParams extends ListRef {
  embeddedData?: string[];
  contactHistory?: boolean;
  lastRecipientId?: string;
  numberOfRecords?: number;
  exportLanguage?: boolean;
  unsubscribed?: boolean;
  subscribed?: boolean;
}

export interface RemoveContactParams extends ListRef {
  recipientId: string;
}

export interface SubscribeParams extends WithExtra {
  name: string;
  publicationUrl: string;
  /** Event topic, wildcards allowed (`threesixty.*`). */
  topics: string;
  encrypt?: boolean;
  sharedKey?: string;
  brandId?: string;
}

// ============================================================================
// Operation Surface
// ============================================================================

export interface QualtricsApi {
  // Panels
  createPanel(params: CreatePanelParams): Promise<string>;
  deletePanel(params: PanelRef): Promise<void>;
  getPanelMemberCount(params: PanelRef): Promise<number>;
  getPanels(libraryId: string): Promise<PanelSummary[]>;
  getPanel(params: GetPanelParams): Promise<Outcome<PanelMember[]>>;
  importPanel(params: ImportPanelParams): Promise<string>;
  importJsonPanel(params: ImportJsonPanelParams): Promise<string>;

  // Recipients
  addRecipient(params: AddRecipientParams): Promise<string>;
  getRecipient(params: RecipientRef): Promise<Recipient>;
  removeRecipient(params: RemoveRecipientParams): Promise<void>;

  // Distributions
  sendSurveyToIndividual(params: SendSurveyToIndividualParams): Promise<string>;
  sendSurveyToPanel(params: SendSurveyToPanelParams): Promise<string>;
  sendReminder(params: SendReminderParams): Promise<string>;
  createDistribution(params: CreateDistributionParams): Promise<string>;
  getDistributions(params: GetDistributionsParams): Promise<Record<string, unknown>>;

  // Surveys
  getSurveys(extra?: Passthrough): Promise<SurveySummary[]>;
  getSurvey(surveyId: string): Promise<Outcome<SurveyDocument>>;
  importSurvey(params: ImportSurveyParams): Promise<string>;
  deleteSurvey(surveyId: string): Promise<void>;
  activateSurvey(surveyId: string): Promise<void>;
  deactivateSurvey(surveyId: string): Promise<void>;

  // Responses
  getLegacyResponseData(query: LegacyResponseQuery): Promise<Outcome<Record<string, LegacyResponse>>>;
  getResponse(params: ResponseRef): Promise<LegacyResponse>;
  importResponses(params: ImportResponsesParams): Promise<void>;
  importResponsesAsDict(params: ImportResponseRecordsParams): Promise<void>;
  updateResponseEmbeddedData(params: UpdateEmbeddedDataParams): Promise<void>;
  getSingleResponseHTML(params: ResponseRef): Promise<string>;

  // Response exports
  createResponseExport(params: CreateExportParams): Promise<ExportHandle>;
  getResponseExportProgress(exportId: string): Promise<ExportProgress>;
  getResponseExportFile(exportIdOrUrl: string): Promise<Uint8Array>;

  // Contacts
  importContacts(params: ImportContactsParams): Promise<string>;
  getListContacts(params: GetListContactsParams): Promise<Outcome<Contact[]>>;
  removeContact(params: RemoveContactParams): Promise<void>;

  // Subscriptions
  getAllSubscriptions(): Promise<Record<string, unknown>>;
  subscribe(params: SubscribeParams): Promise<Record<string, unknown>>;
}
