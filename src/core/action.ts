/**
 * Decoding for action endpoints.
 *
 * Restart, cancel and trigger answer with a `pending` document instead of
 * an envelope:
 *
 *   { "@type": "pending", "resource_type": "build", "state_change": "restart", "build": {...} }
 */

import type { z } from "zod";
import {
  TravisError,
  failure,
  success,
  type DecodeResult,
  type RawResponse,
} from "./types.js";
import {
  DISCRIMINATOR_KEY,
  decodeDocument,
  decodeRemoteError,
  decodeWith,
  isJsonObject,
  selectPayload,
} from "./envelope.js";

export interface ActionResult<T> {
  readonly type: string;
  readonly resourceType: string;
  readonly stateChange?: string;
  readonly resource: T;
}

export function decodeAction<T>(
  document: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): DecodeResult<ActionResult<T>> {
  if (!isJsonObject(document)) {
    return failure(new TravisError("schemaMismatch", "Expected the document to be a JSON object"));
  }

  const type = document[DISCRIMINATOR_KEY];
  if (type === undefined || type === null) {
    return failure(
      new TravisError("missingDiscriminator", `Document has no "${DISCRIMINATOR_KEY}" discriminator`, {
        field: DISCRIMINATOR_KEY,
      })
    );
  }
  if (typeof type !== "string") {
    return failure(
      new TravisError("schemaMismatch", `Expected "${DISCRIMINATOR_KEY}" to be a string`, {
        field: DISCRIMINATOR_KEY,
      })
    );
  }

  const resourceType = document["resource_type"];
  if (resourceType === undefined || resourceType === null) {
    return failure(
      new TravisError("missingField", 'Document has no "resource_type"', { field: "resource_type" })
    );
  }
  if (typeof resourceType !== "string") {
    return failure(
      new TravisError("schemaMismatch", 'Expected "resource_type" to be a string', {
        field: "resource_type",
      })
    );
  }

  const stateChange = document["state_change"];
  if (stateChange !== undefined && stateChange !== null && typeof stateChange !== "string") {
    return failure(
      new TravisError("schemaMismatch", 'Expected "state_change" to be a string', {
        field: "state_change",
      })
    );
  }

  const selection = selectPayload(document, resourceType);
  const resource = decodeWith(schema, selection.value, `"${resourceType}" resource`);
  if (!resource.ok) {
    return resource;
  }

  const result: { -readonly [K in keyof ActionResult<T>]: ActionResult<T>[K] } = {
    type,
    resourceType,
    resource: resource.value,
  };
  if (typeof stateChange === "string") {
    result.stateChange = stateChange;
  }
  return success(result);
}

export function decodeActionResponse<T>(
  response: RawResponse,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): DecodeResult<ActionResult<T>> {
  return decodeDocument(response, (document) => decodeAction(document, schema));
}

/**
 * For endpoints that answer 204 No Content. A body, when present, is only
 * inspected for an error document.
 */
export function decodeNoContent(response: RawResponse): DecodeResult<void> {
  if (response.body.trim().length === 0 && response.status < 300) {
    return success(undefined);
  }
  return decodeDocument(response, (document) => {
    const remote = decodeRemoteError(document, response.status);
    if (remote) {
      return failure(remote);
    }
    if (response.status >= 300) {
      return failure(
        new TravisError("schemaMismatch", `Unexpected ${response.status} response`, {
          status: response.status,
        })
      );
    }
    return success(undefined);
  });
}
