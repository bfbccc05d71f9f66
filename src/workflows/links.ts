import type { EmbeddedData } from '../api/params.js';
import type { QualtricsApi } from '../api/types.js';

export interface UniqueLinkParams {
  surveyId: string;
  libraryId: string;
  panelId: string;
  distributionId: string;
  firstName: string;
  lastName: string;
  email: string;
  externalDataRef?: string;
  language?: string;
  embeddedData?: EmbeddedData;
}

const LINK_BASE = 'http://new.qualtrics.com/SE?Q_DL=';

function idSuffix(id: string, prefix: string): string {
  const [head, suffix] = id.split('_');
  if (!suffix || head !== prefix) {
    throw new RangeError(`Invalid ${prefix === 'SV' ? 'SurveyID' : 'DistributionID'} format (must be ${prefix}_xxxxxxxxxx)`);
  }
  return suffix;
}

/**
 * Adds a person to the panel and builds their personal survey link from the
 * distribution, survey and recipient ids. Id formats are checked before the
 * recipient is created.
 */
export async function generateUniqueSurveyLink(api: QualtricsApi, params: UniqueLinkParams): Promise<string> {
  const survey = idSuffix(params.surveyId, 'SV');
  const distribution = idSuffix(params.distributionId, 'EMD');

  const recipientId = await api.addRecipient({
    libraryId: params.libraryId,
    panelId: params.panelId,
    firstName: params.firstName,
    lastName: params.lastName,
    email: params.email,
    externalDataRef: params.externalDataRef ?? '',
    language: params.language ?? 'English',
    embeddedData: params.embeddedData ?? {},
  });

  return `${LINK_BASE}${distribution}_${survey}_${recipientId}`;
}
