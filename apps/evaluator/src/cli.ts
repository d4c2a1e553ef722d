import { parseArgs } from "node:util";
import { AgentProvider } from "@reviewloop/llm";
import { HostingProvider, type HostingKind } from "@reviewloop/vcs";

export interface CliOptions {
  help: boolean;
  provider?: AgentProvider;
  model?: string;
  baseUrl?: string;
  hosting?: HostingKind;
  scenariosDir?: string;
  only: string[];
  reportPath?: string;
  keepWorkingTrees: boolean;
}

export const USAGE = `
Usage: npm run evaluate -- [options]

Options:
  --provider <local|openai|gemini>  Agent provider (env: AGENT_PROVIDER, default gemini)
  --model <name>                    Model name (env: AGENT_MODEL)
  --base-url <url>                  OpenAI-compatible base URL (env: AGENT_BASE_URL)
  --hosting <local|github|gitlab>   Hosting service (env: HOSTING_PROVIDER, default local)
  --scenarios <dir>                 Scenario directory (env: EVALUATOR_SCENARIOS_DIR)
  --only <id>                       Run only this scenario; repeat or comma-separate
  --report <path>                   Write the JSON report here (env: EVALUATOR_REPORT_PATH)
  --keep                            Keep working trees after each scenario
  -h, --help                        Show this help

Example:
  npm run evaluate -- --provider local --base-url http://localhost:6655/v1 --only race-condition-deposit
`.trim();

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      help: { type: "boolean", short: "h", default: false },
      provider: { type: "string" },
      model: { type: "string" },
      "base-url": { type: "string" },
      hosting: { type: "string" },
      scenarios: { type: "string" },
      only: { type: "string", multiple: true },
      report: { type: "string" },
      keep: { type: "boolean", default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    help: values.help ?? false,
    provider: values.provider === undefined ? undefined : AgentProvider.parse(values.provider),
    model: values.model,
    baseUrl: values["base-url"],
    hosting: values.hosting === undefined ? undefined : HostingProvider.parse(values.hosting),
    scenariosDir: values.scenarios,
    only: (values.only ?? [])
      .flatMap((entry) => entry.split(","))
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
    reportPath: values.report,
    keepWorkingTrees: values.keep ?? false,
  };
}
