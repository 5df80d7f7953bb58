import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import autocannon from "autocannon";
import { createLogger } from "@tollgate/shared";
import { loadRuleSetFromFile } from "../apps/api/src/rules/rule-set.js";

const logger = createLogger(process.env.LOG_LEVEL ?? "info", { component: "load" });

interface Scenario {
  operationId: string;
  ip: string;
  durationSeconds: number;
  connections: number;
}

interface ScenarioReport {
  operationId: string;
  durationSeconds: number;
  requests: number;
  admitted: number;
  denied: number;
  errors: number;
  /** What a single client may be admitted in the window: capacity plus refill. */
  expectedAdmitted: number;
  p50: number;
  p99: number;
}

function runScenario(url: string, scenario: Scenario): Promise<Omit<ScenarioReport, "expectedAdmitted">> {
  return new Promise((resolve, reject) => {
    const statuses = { admitted: 0, denied: 0, errors: 0 };

    const instance = autocannon({
      url,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ operationId: scenario.operationId, ip: scenario.ip }),
      connections: scenario.connections,
      duration: scenario.durationSeconds
    });

    instance.on("response", (_client, statusCode) => {
      if (statusCode === 200) {
        statuses.admitted += 1;
      } else if (statusCode === 429) {
        statuses.denied += 1;
      } else {
        statuses.errors += 1;
      }
    });

    instance.on("done", (result) => {
      resolve({
        operationId: scenario.operationId,
        durationSeconds: scenario.durationSeconds,
        requests: result.requests.total,
        ...statuses,
        p50: result.latency.p50,
        p99: result.latency.p99
      });
    });

    instance.on("error", reject);
  });
}

async function main(): Promise<void> {
  const endpoint = process.env.LOAD_URL ?? "http://localhost:3001/v1/ratelimit/check";
  const rules = await loadRuleSetFromFile(process.env.RULES_FILE ?? "config/rules.json");
  const durationSeconds = Number(process.env.LOAD_DURATION_SECONDS ?? 10);

  const scenarios: Scenario[] = rules
    .list()
    .filter((rule) => rule.enabled && rule.scope !== "user" && rule.scope !== "user_resource")
    .map((rule) => ({ operationId: rule.operationId, ip: "198.51.100.10", durationSeconds, connections: 50 }));

  const reports: ScenarioReport[] = [];
  for (const scenario of scenarios) {
    const rule = rules.get(scenario.operationId);
    if (!rule) {
      continue;
    }

    const measured = await runScenario(endpoint, scenario);
    const expectedAdmitted = Math.floor(
      (rule.capacity + (durationSeconds * rule.refillRatePerMinute) / 60) / rule.cost
    );
    const report = { ...measured, expectedAdmitted };
    reports.push(report);

    logger.info(report, measured.admitted > expectedAdmitted ? "Quota exceeded under load" : "Quota held under load");
  }

  await mkdir("reports", { recursive: true });
  const reportPath = join("reports", `load-report-${new Date().toISOString().replace(/[:.]/g, "-")}.json`);
  await writeFile(reportPath, JSON.stringify({ createdAt: new Date().toISOString(), endpoint, scenarios: reports }, null, 2), "utf8");

  logger.info({ reportPath }, "Load report written");
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Load run failed");
  process.exit(1);
});
