import { z } from "zod";
import type { RemoteErrorMessage } from "../core/types.js";

/**
 * Error document, e.g.
 * { "@type": "error", "error_type": "not_found", "error_message": "repository not found (or insufficient access)", "resource_type": "repository" }
 */
export const RemoteErrorSchema = z
  .object({
    "@type": z.literal("error"),
    error_type: z.string(),
    error_message: z.string(),
    resource_type: z.string().optional(),
  })
  .passthrough();

export type RemoteErrorDocument = z.infer<typeof RemoteErrorSchema>;

export function toRemoteErrorMessage(document: RemoteErrorDocument): RemoteErrorMessage {
  const message: RemoteErrorMessage = {
    errorType: document.error_type,
    errorMessage: document.error_message,
  };
  if (document.resource_type !== undefined) {
    message.resourceType = document.resource_type;
  }
  return message;
}
