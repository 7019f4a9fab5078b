/**
 * Travis v3 client - Main entry point
 */

import type { z } from "zod";
import type {
  ObservabilityAdapter,
  QueryParams,
  RequestOptions,
  RequestTarget,
  TravisClientConfig,
  TravisResult,
} from "./core/types.js";
import { RequestPipeline, type Decoder } from "./core/pipeline.js";
import { validateConfig } from "./core/config.js";
import { immediateDelivery, type Completion } from "./core/delivery.js";
import { decodeResponse, type Envelope, type Page } from "./core/envelope.js";
import { decodeActionResponse, decodeNoContent, type ActionResult } from "./core/action.js";
import { apiPath, buildRequest, createRequestTarget } from "./core/request-builder.js";
import { followMinimal, followPage } from "./core/links.js";
import { ConsoleObservability } from "./observability/console.js";
import { FetchTransport } from "./transport/fetch.js";
import {
  BranchListSchema,
  BranchSchema,
  BuildListSchema,
  BuildSchema,
  CronListSchema,
  CronSchema,
  EnvironmentVariableListSchema,
  EnvironmentVariableSchema,
  JobListSchema,
  JobSchema,
  LogSchema,
  MinimalBuildSchema,
  MinimalJobSchema,
  MinimalRequestSchema,
  OwnerSchema,
  RepositoryListSchema,
  RepositorySchema,
  SettingListSchema,
  SettingSchema,
  UserSchema,
  buildQueryParams,
  encodeCron,
  encodeEnvironmentVariable,
  encodeSetting,
  encodeTriggerBuild,
  fullSchemaFor,
  generalQueryParams,
  repositoryQueryParams,
  type Branch,
  type Build,
  type BuildQuery,
  type Cron,
  type CronRequest,
  type EnvironmentVariable,
  type EnvironmentVariableRequest,
  type FullResources,
  type GeneralQuery,
  type Job,
  type Log,
  type MinimalBuild,
  type MinimalJob,
  type MinimalReference,
  type MinimalRequest,
  type Owner,
  type Repository,
  type RepositoryQuery,
  type ResourceKind,
  type Setting,
  type SettingValue,
  type TriggerBuildRequest,
  type User,
} from "./models/index.js";

export type ModelSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** Repository id or "owner/name" slug */
export type RepositoryId = number | string;

export type EnvelopeResult<T> = Promise<TravisResult<Envelope<T>>>;
export type ActionOutcome<T> = Promise<TravisResult<ActionResult<T>>>;

export const DEFAULT_MAX_PAGES = 1000;

export interface PaginateOptions {
  /** Pages fetched after `first` before iteration stops (default: 1000) */
  maxPages?: number;
}

export class TravisClient {
  private readonly target: RequestTarget;
  private readonly pipeline: RequestPipeline;

  constructor(config: TravisClientConfig) {
    validateConfig(config);

    this.target = createRequestTarget(config.token, config.endpoint, config.userAgent);

    let observability: ObservabilityAdapter[];
    if (Array.isArray(config.observability)) {
      observability = config.observability;
    } else if (config.observability) {
      observability = [config.observability];
    } else {
      observability = [new ConsoleObservability()];
    }

    const transport = config.transport ?? new FetchTransport(
      config.timeout !== undefined ? { timeout: config.timeout } : {}
    );

    this.pipeline = new RequestPipeline({
      transport,
      delivery: config.delivery ?? immediateDelivery,
      observability,
      ...(config.sanitizer !== undefined ? { sanitizerOptions: config.sanitizer } : {}),
    });
  }

  /** API host requests are sent to */
  get host(): string {
    return this.target.host;
  }

  // ==========================================================================
  // Low-level access
  // ==========================================================================

  /**
   * Sends an arbitrary request and decodes the answer as an envelope.
   * `completion` runs on the delivery context before the promise settles.
   */
  request<T>(
    options: RequestOptions,
    schema: ModelSchema<T>,
    completion?: Completion<TravisResult<Envelope<T>>>
  ): EnvelopeResult<T> {
    return this.send(options, (response) => decodeResponse(response, schema), completion);
  }

  private send<T>(
    options: RequestOptions,
    decode: Decoder<T>,
    completion?: Completion<TravisResult<T>>
  ): Promise<TravisResult<T>> {
    return this.pipeline.execute(buildRequest(this.target, options), decode, completion);
  }

  private getEnvelope<T>(path: string, schema: ModelSchema<T>, query?: QueryParams): EnvelopeResult<T> {
    return this.send(
      query !== undefined ? { method: "GET", path, query } : { method: "GET", path },
      (response) => decodeResponse(response, schema)
    );
  }

  private writeEnvelope<T>(
    method: "POST" | "PATCH" | "DELETE",
    path: string,
    schema: ModelSchema<T>,
    body?: unknown
  ): EnvelopeResult<T> {
    return this.send(
      body !== undefined ? { method, path, body } : { method, path },
      (response) => decodeResponse(response, schema)
    );
  }

  private action<T>(path: string, schema: ModelSchema<T>, body?: unknown): ActionOutcome<T> {
    return this.send(
      body !== undefined ? { method: "POST", path, body } : { method: "POST", path },
      (response) => decodeActionResponse(response, schema)
    );
  }

  private remove(path: string): Promise<TravisResult<void>> {
    return this.send({ method: "DELETE", path }, decodeNoContent);
  }

  // ==========================================================================
  // Repositories
  // ==========================================================================

  repositories(owner: string, query?: RepositoryQuery): EnvelopeResult<Repository[]> {
    return this.getEnvelope(apiPath("owner", owner, "repos"), RepositoryListSchema, repositoryQueryParams(query));
  }

  /** Repositories of the authenticated user */
  userRepositories(query?: RepositoryQuery): EnvelopeResult<Repository[]> {
    return this.getEnvelope(apiPath("repos"), RepositoryListSchema, repositoryQueryParams(query));
  }

  repository(repo: RepositoryId): EnvelopeResult<Repository> {
    return this.getEnvelope(apiPath("repo", repo), RepositorySchema);
  }

  activateRepository(repo: RepositoryId): EnvelopeResult<Repository> {
    return this.writeEnvelope("POST", apiPath("repo", repo, "activate"), RepositorySchema);
  }

  deactivateRepository(repo: RepositoryId): EnvelopeResult<Repository> {
    return this.writeEnvelope("POST", apiPath("repo", repo, "deactivate"), RepositorySchema);
  }

  starRepository(repo: RepositoryId): EnvelopeResult<Repository> {
    return this.writeEnvelope("POST", apiPath("repo", repo, "star"), RepositorySchema);
  }

  unstarRepository(repo: RepositoryId): EnvelopeResult<Repository> {
    return this.writeEnvelope("POST", apiPath("repo", repo, "unstar"), RepositorySchema);
  }

  // ==========================================================================
  // Owners and users
  // ==========================================================================

  currentUser(): EnvelopeResult<User> {
    return this.getEnvelope(apiPath("user"), UserSchema);
  }

  user(id: number): EnvelopeResult<User> {
    return this.getEnvelope(apiPath("user", id), UserSchema);
  }

  owner(login: string): EnvelopeResult<Owner> {
    return this.getEnvelope(apiPath("owner", login), OwnerSchema);
  }

  /** Builds currently running for an owner */
  activeBuilds(owner: string): EnvelopeResult<Build[]> {
    return this.getEnvelope(apiPath("owner", owner, "active"), BuildListSchema);
  }

  // ==========================================================================
  // Builds
  // ==========================================================================

  userBuilds(query?: BuildQuery): EnvelopeResult<Build[]> {
    return this.getEnvelope(apiPath("builds"), BuildListSchema, buildQueryParams(query));
  }

  builds(repo: RepositoryId, query?: BuildQuery): EnvelopeResult<Build[]> {
    return this.getEnvelope(apiPath("repo", repo, "builds"), BuildListSchema, buildQueryParams(query));
  }

  build(id: number): EnvelopeResult<Build> {
    return this.getEnvelope(apiPath("build", id), BuildSchema);
  }

  restartBuild(id: number): ActionOutcome<MinimalBuild> {
    return this.action(apiPath("build", id, "restart"), MinimalBuildSchema);
  }

  cancelBuild(id: number): ActionOutcome<MinimalBuild> {
    return this.action(apiPath("build", id, "cancel"), MinimalBuildSchema);
  }

  triggerBuild(repo: RepositoryId, request: TriggerBuildRequest): ActionOutcome<MinimalRequest> {
    return this.action(apiPath("repo", repo, "requests"), MinimalRequestSchema, encodeTriggerBuild(request));
  }

  // ==========================================================================
  // Jobs and logs
  // ==========================================================================

  jobs(buildId: number, query?: GeneralQuery): EnvelopeResult<Job[]> {
    return this.getEnvelope(apiPath("build", buildId, "jobs"), JobListSchema, generalQueryParams(query));
  }

  job(id: number): EnvelopeResult<Job> {
    return this.getEnvelope(apiPath("job", id), JobSchema);
  }

  restartJob(id: number): ActionOutcome<MinimalJob> {
    return this.action(apiPath("job", id, "restart"), MinimalJobSchema);
  }

  cancelJob(id: number): ActionOutcome<MinimalJob> {
    return this.action(apiPath("job", id, "cancel"), MinimalJobSchema);
  }

  log(jobId: number): EnvelopeResult<Log> {
    return this.getEnvelope(apiPath("job", jobId, "log"), LogSchema);
  }

  /** Clears a job's log; the answer is the emptied log */
  deleteLog(jobId: number): EnvelopeResult<Log> {
    return this.writeEnvelope("DELETE", apiPath("job", jobId, "log"), LogSchema);
  }

  // ==========================================================================
  // Branches
  // ==========================================================================

  branches(repo: RepositoryId, query?: GeneralQuery): EnvelopeResult<Branch[]> {
    return this.getEnvelope(apiPath("repo", repo, "branches"), BranchListSchema, generalQueryParams(query));
  }

  branch(repo: RepositoryId, name: string): EnvelopeResult<Branch> {
    return this.getEnvelope(apiPath("repo", repo, "branch", name), BranchSchema);
  }

  // ==========================================================================
  // Environment variables
  // ==========================================================================

  environmentVariables(repo: RepositoryId): EnvelopeResult<EnvironmentVariable[]> {
    return this.getEnvelope(apiPath("repo", repo, "env_vars"), EnvironmentVariableListSchema);
  }

  environmentVariable(repo: RepositoryId, id: string): EnvelopeResult<EnvironmentVariable> {
    return this.getEnvelope(apiPath("repo", repo, "env_var", id), EnvironmentVariableSchema);
  }

  createEnvironmentVariable(
    repo: RepositoryId,
    variable: EnvironmentVariableRequest
  ): EnvelopeResult<EnvironmentVariable> {
    return this.writeEnvelope(
      "POST",
      apiPath("repo", repo, "env_vars"),
      EnvironmentVariableSchema,
      encodeEnvironmentVariable(variable)
    );
  }

  /** Only the fields present in `changes` are sent */
  updateEnvironmentVariable(
    repo: RepositoryId,
    id: string,
    changes: Partial<EnvironmentVariableRequest>
  ): EnvelopeResult<EnvironmentVariable> {
    return this.writeEnvelope(
      "PATCH",
      apiPath("repo", repo, "env_var", id),
      EnvironmentVariableSchema,
      encodeEnvironmentVariable(changes)
    );
  }

  deleteEnvironmentVariable(repo: RepositoryId, id: string): Promise<TravisResult<void>> {
    return this.remove(apiPath("repo", repo, "env_var", id));
  }

  // ==========================================================================
  // Settings
  // ==========================================================================

  settings(repo: RepositoryId): EnvelopeResult<Setting[]> {
    return this.getEnvelope(apiPath("repo", repo, "settings"), SettingListSchema);
  }

  setting(repo: RepositoryId, name: string): EnvelopeResult<Setting> {
    return this.getEnvelope(apiPath("repo", repo, "setting", name), SettingSchema);
  }

  updateSetting(repo: RepositoryId, name: string, value: SettingValue): EnvelopeResult<Setting> {
    return this.writeEnvelope("PATCH", apiPath("repo", repo, "setting", name), SettingSchema, encodeSetting(value));
  }

  // ==========================================================================
  // Crons
  // ==========================================================================

  crons(repo: RepositoryId): EnvelopeResult<Cron[]> {
    return this.getEnvelope(apiPath("repo", repo, "crons"), CronListSchema);
  }

  cron(id: number): EnvelopeResult<Cron> {
    return this.getEnvelope(apiPath("cron", id), CronSchema);
  }

  branchCron(repo: RepositoryId, branch: string): EnvelopeResult<Cron> {
    return this.getEnvelope(apiPath("repo", repo, "branch", branch, "cron"), CronSchema);
  }

  createCron(repo: RepositoryId, branch: string, request: CronRequest): EnvelopeResult<Cron> {
    return this.writeEnvelope("POST", apiPath("repo", repo, "branch", branch, "cron"), CronSchema, encodeCron(request));
  }

  deleteCron(id: number): Promise<TravisResult<void>> {
    return this.remove(apiPath("cron", id));
  }

  // ==========================================================================
  // Links
  // ==========================================================================

  /**
   * Fetches the full representation behind an embedded stub.
   * Returns `undefined` when the stub carries no href.
   */
  follow<K extends ResourceKind>(reference: MinimalReference<K>): EnvelopeResult<FullResources[K]> | undefined {
    const built = followMinimal(reference, this.target);
    if (built === undefined) {
      return undefined;
    }
    const schema = fullSchemaFor(reference["@type"]);
    if (!built.ok) {
      return this.pipeline.reject<Envelope<FullResources[K]>>(built.error);
    }
    return this.pipeline.execute(built.value, (response) => decodeResponse(response, schema));
  }

  followPage<T>(page: Page, schema: ModelSchema<T>): EnvelopeResult<T> {
    const built = followPage(page, this.target);
    if (!built.ok) {
      return this.pipeline.reject<Envelope<T>>(built.error);
    }
    return this.pipeline.execute(built.value, (response) => decodeResponse(response, schema));
  }

  /**
   * Walks the `next` links after `first`, yielding one result per page.
   *
   * Stops when a page has no `next`, after a failed page (which is yielded),
   * when a link repeats, or at `maxPages`. The last two are reported as
   * warnings.
   */
  async *paginate<T>(
    first: Envelope<T>,
    schema: ModelSchema<T>,
    options: PaginateOptions = {}
  ): AsyncGenerator<TravisResult<Envelope<T>>, void, undefined> {
    const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    const seen = new Set<string>([first.path]);
    if (first.pagination?.self !== undefined) {
      seen.add(first.pagination.self.path);
    }

    let next = first.pagination?.next;
    let pageCount = 0;

    while (next !== undefined) {
      if (seen.has(next.path)) {
        this.pipeline.warn("Pagination cycle detected", { path: next.path, pages: pageCount });
        return;
      }
      if (pageCount >= maxPages) {
        this.pipeline.warn(`Pagination limit reached: ${maxPages} pages`, { path: next.path });
        return;
      }
      seen.add(next.path);

      const page = await this.followPage(next, schema);
      pageCount++;
      yield page;

      if (!page.ok) {
        return;
      }
      next = page.value.pagination?.next;
    }
  }
}
