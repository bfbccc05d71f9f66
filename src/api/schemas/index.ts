/**
 * Zod schemas for API response validation.
 * All replies MUST be validated through these schemas.
 *
 * This ensures:
 * 1. No partial success - a reply either matches or raises ProtocolError
 * 2. Drift detection - fixture changes fail fast in tests
 * 3. Type inference - TS types derived from zod schemas
 */

import { z } from 'zod';

// ============================================================================
// Envelope Schemas
// ============================================================================

/** Control-panel API (v2): `{ Meta: { Status, ErrorMessage? }, Result }` */
export const v2MetaSchema = z.object({
  Status: z.string(),
  Debug: z.string().optional(),
  ErrorCode: z.union([z.string(), z.number()]).optional(),
  ErrorMessage: z.string().optional(),
});

export const v2EnvelopeSchema = z.object({
  Meta: v2MetaSchema,
  Result: z.unknown().optional(),
});

export type V2Envelope = z.infer<typeof v2EnvelopeSchema>;

/** Response export API (v3): `{ meta: { httpStatus, error? }, result }` */
export const v3MetaSchema = z.object({
  httpStatus: z.string().optional(),
  requestId: z.string().optional(),
  error: z
    .object({
      errorMessage: z.string(),
      errorCode: z.string().optional(),
    })
    .optional(),
});

export const v3EnvelopeSchema = z.object({
  meta: v3MetaSchema.optional(),
  result: z.unknown().optional(),
});

// ============================================================================
// Entity Schemas
// ============================================================================

export const panelSummarySchema = z
  .object({
    LibraryID: z.string().optional(),
    PanelID: z.string(),
    Name: z.string(),
    Category: z.string().nullable().optional(),
  })
  .passthrough();

export type PanelSummary = z.infer<typeof panelSummarySchema>;

export const panelMemberSchema = z
  .object({
    RecipientID: z.string(),
    FirstName: z.string().nullable().optional(),
    LastName: z.string().nullable().optional(),
    Email: z.string().nullable().optional(),
    ExternalDataReference: z.string().nullable().optional(),
    Language: z.string().nullable().optional(),
    EmbeddedData: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();

export type PanelMember = z.infer<typeof panelMemberSchema>;

export const recipientSchema = z
  .object({
    RecipientID: z.string().optional(),
    FirstName: z.string().nullable().optional(),
    LastName: z.string().nullable().optional(),
    Email: z.string().nullable().optional(),
    ExternalDataReference: z.string().nullable().optional(),
    Language: z.string().nullable().optional(),
  })
  .passthrough();

export type Recipient = z.infer<typeof recipientSchema>;

export const surveySummarySchema = z
  .object({
    SurveyID: z.string(),
    SurveyName: z.string(),
    SurveyStatus: z.string().optional(),
    SurveyOwnerID: z.string().optional(),
    SurveyCreationDate: z.string().optional(),
    LastModified: z.string().optional(),
  })
  .passthrough();

export type SurveySummary = z.infer<typeof surveySummarySchema>;

/** One response in the legacy data format: flat question/value pairs. */
export const legacyResponseSchema = z.record(z.unknown());

export type LegacyResponse = z.infer<typeof legacyResponseSchema>;

/** Responses keyed by id. An empty result arrives as `[]`. */
export const legacyResponseMapSchema = z.union([
  z
    .array(z.never())
    .max(0)
    .transform((): Record<string, LegacyResponse> => ({})),
  z.record(legacyResponseSchema),
]);

export const contactSchema = panelMemberSchema;

export type Contact = PanelMember;

// ============================================================================
// Result Schemas (v2 `Result` payloads)
// ============================================================================

export const panelIdResultSchema = z.object({ PanelID: z.string() });
export const panelCountResultSchema = z.object({ Count: z.coerce.number().int().nonnegative() });
export const panelListResultSchema = z.object({ Panels: z.array(panelSummarySchema) });
export const panelMembersSchema = z.array(panelMemberSchema);
export const recipientIdResultSchema = z.object({ RecipientID: z.string() });
export const recipientResultSchema = z.object({ Recipient: recipientSchema });
export const distributionIdResultSchema = z
  .object({
    EmailDistributionID: z.string(),
    DistributionQueueID: z.string().optional(),
    Success: z.boolean().optional(),
  })
  .passthrough();
export const surveyListResultSchema = z.object({ Surveys: z.array(surveySummarySchema) });
export const surveyIdResultSchema = z.object({ SurveyID: z.string() });
export const listIdResultSchema = z.object({ ListID: z.string() });
export const contactListSchema = z.array(contactSchema);
export const htmlResultSchema = z.string();
export const anyResultSchema = z.unknown();
export const recordResultSchema = z.record(z.unknown());

// ============================================================================
// Response Export Schemas (v3 `result` payloads)
// ============================================================================

export const exportFormats = ['csv', 'csv2013', 'json', 'xml', 'spss'] as const;

export type ExportFormat = (typeof exportFormats)[number];

export const exportCreatedSchema = z.object({ id: z.string().min(1) });

export const exportProgressSchema = z.object({
  id: z.string().optional(),
  percentComplete: z.number().min(0).max(100),
  status: z.string(),
  file: z.string().url().optional(),
});

export type ExportProgressPayload = z.infer<typeof exportProgressSchema>;
