/**
 * Qualtrics client.
 *
 * Configuration is explicit and frozen per client; there is no module-level
 * default token. Clients hold no other state, so one instance can serve
 * concurrent calls.
 */

import { defineConfig } from '../config.js';
import type { ConfigInput, QualtricsConfig } from '../config.js';
import { createTransport } from './http.js';
import { contactOperations } from './operations/contacts.js';
import { distributionOperations } from './operations/distributions.js';
import { exportOperations } from './operations/exports.js';
import { panelOperations } from './operations/panels.js';
import { recipientOperations } from './operations/recipients.js';
import { responseOperations } from './operations/responses.js';
import { subscriptionOperations } from './operations/subscriptions.js';
import { surveyOperations } from './operations/surveys.js';
import type { QualtricsApi } from './types.js';

export interface QualtricsClient extends QualtricsApi {
  readonly config: QualtricsConfig;
}

/** Accepts raw settings or the result of `loadConfig`; both are validated. */
export function createClient(config: ConfigInput): QualtricsClient {
  const resolved = defineConfig(config);
  const transport = createTransport(resolved);

  return {
    config: resolved,
    ...panelOperations(transport),
    ...recipientOperations(transport),
    ...distributionOperations(transport),
    ...surveyOperations(transport),
    ...responseOperations(transport),
    ...exportOperations(transport),
    ...contactOperations(transport),
    ...subscriptionOperations(transport),
  };
}
