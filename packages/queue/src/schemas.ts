import { z } from 'zod';

/**
 * Address-activity webhook body as the event provider sends it. Only the
 * path down to the block logs is checked; every other key is kept.
 */
export const BlockchainWebhookPayloadSchema = z
  .object({
    event: z
      .object({
        network: z.string(),
        data: z
          .object({
            block: z
              .object({
                logs: z.array(z.record(z.unknown())),
              })
              .passthrough(),
          })
          .passthrough(),
      })
      .passthrough(),
  })
  .passthrough();

export type BlockchainWebhookPayload = z.infer<typeof BlockchainWebhookPayloadSchema>;
