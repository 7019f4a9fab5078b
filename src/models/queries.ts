/**
 * Query parameters accepted by collection endpoints, mapped onto the
 * API's parameter names.
 */

import type { QueryParams } from "../core/types.js";
import type { BuildState } from "./minimal.js";

export interface GeneralQuery {
  limit?: number;
  offset?: number;
  /** e.g. "name" or "id:desc" */
  sortBy?: string;
  /** Eager-load attributes, e.g. ["build.commit", "repository.current_build"] */
  include?: string[];
}

export interface RepositoryQuery extends GeneralQuery {
  active?: boolean;
  private?: boolean;
  starred?: boolean;
}

export interface BuildQuery extends GeneralQuery {
  state?: BuildState | BuildState[];
  eventType?: string | string[];
  branch?: string;
  createdBy?: string;
}

function list(value: string | string[]): string {
  return Array.isArray(value) ? value.join(",") : value;
}

export function generalQueryParams(query: GeneralQuery = {}): QueryParams {
  const params: QueryParams = {};
  if (query.limit !== undefined) {
    params["limit"] = String(query.limit);
  }
  if (query.offset !== undefined) {
    params["offset"] = String(query.offset);
  }
  if (query.sortBy !== undefined) {
    params["sort_by"] = query.sortBy;
  }
  if (query.include !== undefined && query.include.length > 0) {
    params["include"] = query.include.join(",");
  }
  return params;
}

export function repositoryQueryParams(query: RepositoryQuery = {}): QueryParams {
  const params = generalQueryParams(query);
  if (query.active !== undefined) {
    params["repository.active"] = String(query.active);
  }
  if (query.private !== undefined) {
    params["repository.private"] = String(query.private);
  }
  if (query.starred !== undefined) {
    params["repository.starred"] = String(query.starred);
  }
  return params;
}

export function buildQueryParams(query: BuildQuery = {}): QueryParams {
  const params = generalQueryParams(query);
  if (query.state !== undefined) {
    params["build.state"] = list(query.state);
  }
  if (query.eventType !== undefined) {
    params["build.event_type"] = list(query.eventType);
  }
  if (query.branch !== undefined) {
    params["branch.name"] = query.branch;
  }
  if (query.createdBy !== undefined) {
    params["build.created_by"] = query.createdBy;
  }
  return params;
}
