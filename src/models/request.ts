/**
 * Body for triggering a build through the requests endpoint.
 */
export interface TriggerBuildRequest {
  branch?: string;
  message?: string;
  sha?: string;
  config?: Record<string, unknown>;
}

export function encodeTriggerBuild(request: TriggerBuildRequest): { request: TriggerBuildRequest } {
  const body: TriggerBuildRequest = {};
  if (request.branch !== undefined) body.branch = request.branch;
  if (request.message !== undefined) body.message = request.message;
  if (request.sha !== undefined) body.sha = request.sha;
  if (request.config !== undefined) body.config = request.config;
  return { request: body };
}
