import type { Transport } from '../http.js';
import { recordResultSchema } from '../schemas/index.js';
import type { QualtricsApi } from '../types.js';
import { callV2 } from '../v2.js';

export type SubscriptionOperations = Pick<QualtricsApi, 'getAllSubscriptions' | 'subscribe'>;

export function subscriptionOperations(transport: Transport): SubscriptionOperations {
  return {
    getAllSubscriptions: () => callV2(transport, { request: 'getAllSubscriptions' }, recordResultSchema),

    subscribe: ({ name, publicationUrl, topics, encrypt, sharedKey, brandId, extra }) =>
      callV2(
        transport,
        {
          request: 'subscribe',
          params: {
            Name: name,
            PublicationURL: publicationUrl,
            Topics: topics,
            Encrypt: encrypt,
            SharedKey: sharedKey,
            BrandID: brandId,
            ...extra,
          },
        },
        recordResultSchema
      ),
  };
}
