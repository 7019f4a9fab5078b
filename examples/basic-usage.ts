import { TravisClient } from "../src/index.js";
import { configFromEnv } from "../src/core/config.js";
import { ConsoleObservability } from "../src/observability/console.js";
import { BuildListSchema } from "../src/models/index.js";

async function main() {
  const client = new TravisClient({
    ...configFromEnv(process.env),
    observability: new ConsoleObservability({ pretty: true }),
  });

  console.log("Fetching current user...");
  const me = await client.currentUser();
  if (!me.ok) {
    console.error(`Failed (${me.error.kind}):`, me.error.message);
    return;
  }
  console.log("Logged in as", me.value.get("login"));

  const slug = process.argv[2] ?? `${me.value.get("login")}/example`;

  console.log(`\nRecent builds of ${slug}...`);
  const first = await client.builds(slug, { limit: 10, sortBy: "id:desc" });
  if (!first.ok) {
    console.error(`Failed (${first.error.kind}):`, first.error.message);
    return;
  }

  let shown = 0;
  for (const build of first.value) {
    console.log(`#${build.number} ${build.state} on ${build.branch.name}`);
    shown++;
  }

  for await (const page of client.paginate(first.value, BuildListSchema, { maxPages: 2 })) {
    if (!page.ok) {
      console.error("Stopped paging:", page.error.message);
      break;
    }
    for (const build of page.value) {
      console.log(`#${build.number} ${build.state} on ${build.branch.name}`);
      shown++;
    }
  }
  console.log(`${shown} builds listed`);

  const latest = first.value.object[0];
  if (latest !== undefined) {
    const pending = client.follow(latest.repository);
    if (pending !== undefined) {
      const repo = await pending;
      if (repo.ok) {
        console.log(`\nDefault branch: ${repo.value.get("default_branch").name}`);
      }
    }
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
