/**
 * Wire documents shaped like API answers.
 */

export function minimalUser(id = 1, login = "ada") {
  return { "@type": "user", "@href": `/user/${id}`, "@representation": "minimal", id, login };
}

export function minimalRepository(id = 1, slug = "ada/engine") {
  const name = slug.split("/")[1] ?? slug;
  return { "@type": "repository", "@href": `/repo/${id}`, "@representation": "minimal", id, name, slug };
}

export function minimalBranch(repoId = 1, name = "main") {
  return { "@type": "branch", "@href": `/repo/${repoId}/branch/${name}`, "@representation": "minimal", name };
}

export function minimalBuild(id = 100, state = "passed") {
  return {
    "@type": "build",
    "@href": `/build/${id}`,
    "@representation": "minimal",
    id,
    number: String(id),
    state,
    duration: 42,
    event_type: "push",
    previous_state: "passed",
    pull_request_title: null,
    pull_request_number: null,
    started_at: "2024-03-01T10:00:00Z",
    finished_at: "2024-03-01T10:00:42Z",
  };
}

export function minimalCommit(id = 7) {
  return {
    "@type": "commit",
    "@representation": "minimal",
    id,
    sha: "0f1e2d3c4b5a",
    ref: "refs/heads/main",
    message: "Tune the engine",
    compare_url: "https://example.test/compare/0f1e2d3c4b5a",
    committed_at: "2024-03-01T09:59:00Z",
  };
}

export function user(id = 1, login = "ada") {
  return {
    "@type": "user",
    "@href": `/user/${id}`,
    "@representation": "standard",
    id,
    login,
    name: "Ada",
    github_id: 1001,
    avatar_url: null,
    education: false,
    email: "ada@example.test",
  };
}

export function repository(id = 1, slug = "ada/engine") {
  return {
    ...minimalRepository(id, slug),
    "@representation": "standard",
    description: "Analytical engine",
    github_language: "TypeScript",
    active: true,
    private: false,
    owner: minimalUser(),
    default_branch: minimalBranch(id),
    starred: false,
  };
}

export function build(id = 100, state = "passed") {
  return {
    ...minimalBuild(id, state),
    "@representation": "standard",
    repository: minimalRepository(),
    branch: minimalBranch(),
    tag: null,
    commit: minimalCommit(),
    jobs: [{ "@type": "job", "@href": `/job/${id * 10}`, "@representation": "minimal", id: id * 10 }],
  };
}

export function job(id = 1000) {
  return {
    "@type": "job",
    "@href": `/job/${id}`,
    "@representation": "standard",
    id,
    number: "100.1",
    state: "passed",
    started_at: "2024-03-01T10:00:00Z",
    finished_at: "2024-03-01T10:00:40Z",
    build: minimalBuild(),
    queue: "builds.linux",
    repository: minimalRepository(),
    commit: minimalCommit(),
  };
}

export function envVar(id = "env-1", name = "DEPLOY_KEY", value: string | null = "test-secret") {
  return {
    "@type": "env_var",
    "@href": `/repo/1/env_var/${id}`,
    "@representation": "standard",
    id,
    name,
    value,
    public: value !== null,
    branch: null,
  };
}

export function setting(name = "builds_only_with_travis_yml", value: boolean | number = true) {
  return {
    "@type": "setting",
    "@href": `/repo/1/setting/${name}`,
    "@representation": "standard",
    name,
    value,
  };
}

export function cron(id = 5) {
  return {
    "@type": "cron",
    "@href": `/cron/${id}`,
    "@representation": "standard",
    id,
    repository: minimalRepository(),
    branch: minimalBranch(),
    interval: "daily",
    dont_run_if_recent_build_exists: false,
    last_run: null,
    next_run: "2024-03-02T00:00:00Z",
    created_at: "2024-02-01T00:00:00Z",
  };
}

export function collection<T>(type: string, href: string, items: T[], pagination?: Record<string, unknown>) {
  const document: Record<string, unknown> = { "@type": type, "@href": href, "@representation": "standard" };
  if (pagination !== undefined) {
    document["@pagination"] = pagination;
  }
  document[type] = items;
  return document;
}

export function remoteError(errorType = "not_found", message = "repository not found (or insufficient access)") {
  return { "@type": "error", error_type: errorType, error_message: message, resource_type: "repository" };
}
