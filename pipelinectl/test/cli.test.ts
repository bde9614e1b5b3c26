import path from "node:path";
import { describe, expect, it } from "vitest";
import { main } from "../src/cli.js";
import { DEFAULT_MANIFESTS_DIR } from "../src/paths.js";
import { FakeRunner, readyCluster, testRuntime } from "./helpers/fake-runner.js";

const M = DEFAULT_MANIFESTS_DIR;

function pipelineRuns(...runs: [string, string, string][]): string {
  return JSON.stringify({
    kind: "List",
    items: runs.map(([name, type, status]) => ({ metadata: { name }, status: { conditions: [{ type, status }] } })),
  });
}

describe("command router", () => {
  it("prints usage and exits 0 without a verb", async () => {
    const rt = testRuntime(new FakeRunner());
    const code = await main([], rt);

    expect(code).toBe(0);
    expect(rt.stdout.text()).toContain("Usage: pipelinectl [options] [command]");
    expect(rt.stdout.text()).toContain("setup-pipeline");
    expect(rt.runner.calls).toEqual([]);
  });

  it("treats no verb exactly like help", async () => {
    const bare = testRuntime(new FakeRunner());
    const help = testRuntime(new FakeRunner());

    expect(await main([], bare)).toBe(0);
    expect(await main(["help"], help)).toBe(0);
    expect(bare.stdout.text()).toBe(help.stdout.text());
  });

  it.each([["--format", "jsonl"], ["--env", "ci"], ["--dry-run"]])("treats global options without a verb as help: %s", async (...argv) => {
    const opts = testRuntime(new FakeRunner());
    const help = testRuntime(new FakeRunner());

    expect(await main(argv, opts)).toBe(0);
    expect(await main(["help"], help)).toBe(0);
    expect(opts.stdout.text()).toBe(help.stdout.text());
    expect(opts.stderr.text()).toBe("");
    expect(opts.runner.calls).toEqual([]);
  });

  it("reports an invalid configuration once and exits 1", async () => {
    const rt = testRuntime(new FakeRunner(), { NAMESPACE: "Demo_NS" });

    expect(await main(["setup"], rt)).toBe(1);
    expect(rt.stderr.text()).toBe(
      'ERROR: Config invalid: data/namespace must match pattern "^[a-z0-9]([-a-z0-9]{0,61}[a-z0-9])?$"\n',
    );
    expect(rt.stdout.text()).toBe("");
    expect(rt.runner.calls).toEqual([]);
  });

  it.each(["deploy", "setup-all", "SETUP", "setup-pipelines"])("rejects unknown verb %s with usage and exit 1", async (verb) => {
    const rt = testRuntime(new FakeRunner());
    const code = await main([verb], rt);

    expect(code).toBe(1);
    expect(rt.stderr.text()).toContain(`error: unknown command '${verb}'`);
    expect(rt.stderr.text()).toContain("Usage: pipelinectl [options] [command]");
    expect(rt.runner.calls).toEqual([]);
  });
});

describe("setup-pipeline", () => {
  it("skips the bootstrap precondition when asked", async () => {
    const rt = testRuntime(new FakeRunner());
    const code = await main(["setup-pipeline", "skip-bootstrap"], rt);

    expect(code).toBe(0);
    const lines = rt.runner.lines();
    expect(lines.some((l) => l.includes("get ns"))).toBe(false);
    expect(lines.some((l) => l.includes("version"))).toBe(false);
    expect(lines[0]).toBe(`oc -n pipelines-tutorial apply -f ${path.join(M, "01_pipeline/01_apply_manifest_task.yaml")}`);
  });

  it("runs bootstrap before the first apply", async () => {
    const runner = readyCluster().on("get ns pipelines-tutorial", { exitCode: 1, stderr: "not found" });
    const rt = testRuntime(runner);
    const code = await main(["setup-pipeline"], rt);

    expect(code).toBe(0);
    const lines = runner.lines();
    expect(lines.slice(0, 4)).toEqual([
      "tkn version",
      "oc version --client",
      "oc get deployment openshift-pipelines-operator -n openshift-operators -o jsonpath={.status.conditions[0].type}",
      "oc rollout status -w deployment openshift-pipelines-operator -n openshift-operators",
    ]);
    const nsCheck = lines.indexOf("oc -n pipelines-tutorial get ns pipelines-tutorial");
    const created = lines.indexOf("oc -n pipelines-tutorial new-project pipelines-tutorial");
    const firstApply = lines.findIndex((l) => l.includes("apply -f"));
    expect(nsCheck).toBeGreaterThan(0);
    expect(created).toBe(nsCheck + 1);
    expect(firstApply).toBe(created + 1);
  });

  it("does not create the project when it exists", async () => {
    const runner = readyCluster();
    await main(["setup-pipeline"], testRuntime(runner));
    expect(runner.lines()).not.toContain("oc -n pipelines-tutorial new-project pipelines-tutorial");
  });

  it("propagates the exit code of a failing apply", async () => {
    const runner = new FakeRunner().on("apply -f -", { exitCode: 2, stderr: "admission webhook denied" });
    const rt = testRuntime(runner);

    expect(await main(["setup-pipeline", "skip-bootstrap"], rt)).toBe(2);
    expect(rt.stderr.text()).toBe(
      "ERROR: step pipeline/resources failed: oc -n pipelines-tutorial apply -f - exited with 2: admission webhook denied\n",
    );
  });
});

describe("setup-triggers", () => {
  it("applies, exposes, waits and prints the webhook URL for the configured namespace", async () => {
    const runner = new FakeRunner()
      .on("get svc -l eventlistener=vote-app -o name", { stdout: "service/el-vote-app\n" })
      .on("get route -l eventlistener=vote-app -o name", { stdout: "route.route.openshift.io/el-vote-app\n" })
      .on("-o jsonpath={.spec.host}", { stdout: "el-vote-app-demo-ns.apps.example.test" });
    const rt = testRuntime(runner, { NAMESPACE: "demo-ns" });

    const code = await main(["setup-triggers", "skip-bootstrap"], rt);

    expect(code).toBe(0);
    expect(runner.lines()).toEqual([
      `oc -n demo-ns apply -f ${path.join(M, "03_triggers/01_binding.yaml")}`,
      "oc -n demo-ns apply -f -",
      `oc -n demo-ns apply -f ${path.join(M, "03_triggers/03_event_listener.yaml")}`,
      "sleep 3000",
      "oc -n demo-ns get svc -l eventlistener=vote-app -o name",
      "oc -n demo-ns expose service/el-vote-app",
      "sleep 5000",
      "oc -n demo-ns get route -l eventlistener=vote-app -o name",
      "oc -n demo-ns get route.route.openshift.io/el-vote-app -o jsonpath={.spec.host}",
    ]);
    expect(runner.calls[1].input).toContain("svc:5000/demo-ns/$(tt.params.git-repo-name):latest");
    expect(runner.calls[1].input).not.toContain("pipelines-tutorial");
    expect(rt.stdout.text().endsWith("\nINFO: Webhook URL: http://el-vote-app-demo-ns.apps.example.test\n")).toBe(true);
  });
});

describe("setup", () => {
  it("bootstraps once, then provisions pipeline and triggers", async () => {
    const runner = readyCluster()
      .on("get svc -l", { stdout: "service/el-vote-app\n" })
      .on("get route -l", { stdout: "route.route.openshift.io/el-vote-app\n" });
    const code = await main(["setup"], testRuntime(runner));

    expect(code).toBe(0);
    const lines = runner.lines();
    expect(lines.filter((l) => l === "tkn version")).toHaveLength(1);
    expect(lines.indexOf("tkn -n pipelines-tutorial pipeline describe build-and-deploy")).toBeLessThan(
      lines.indexOf(`oc -n pipelines-tutorial apply -f ${path.join(M, "03_triggers/01_binding.yaml")}`),
    );
  });

  it("previews without touching the cluster on --dry-run", async () => {
    const rt = testRuntime(new FakeRunner());
    const code = await main(["--dry-run", "setup"], rt);

    expect(code).toBe(0);
    expect(rt.runner.calls).toEqual([]);
    expect(rt.stdout.text()).toContain("[dry-run] bootstrap: tools, operator readiness, namespace\n");
    expect(rt.stdout.text()).toContain("[dry-run] triggers/expose: expose svc -l eventlistener=vote-app in pipelines-tutorial\n");
  });
});

describe("bootstrap failures", () => {
  it("reports a missing tkn binary", async () => {
    const rt = testRuntime(new FakeRunner().on("tkn version", { exitCode: 127 }));

    expect(await main(["setup"], rt)).toBe(1);
    expect(rt.stderr.text()).toBe("ERROR: no tkn binary found\n");
    expect(rt.runner.lines()).toEqual(["tkn version"]);
  });

  it("reports a missing oc binary", async () => {
    const rt = testRuntime(new FakeRunner().on("oc version --client", { exitCode: 127 }));

    expect(await main(["setup-triggers"], rt)).toBe(1);
    expect(rt.stderr.text()).toBe("ERROR: no oc binary found\n");
  });

  it("gives up on readiness after a configured timeout", async () => {
    const rt = testRuntime(new FakeRunner(), { PIPELINECTL_POLL_TIMEOUT_MS: "2500" });

    expect(await main(["setup"], rt)).toBe(1);
    expect(rt.stderr.text()).toBe(
      'ERROR: timed out waiting for deployment/openshift-pipelines-operator (openshift-operators) to report Available (last observed "" after 4 attempts)\n',
    );
  });

  it("emits readiness transitions as JSON lines", async () => {
    const rt = testRuntime(readyCluster());

    expect(await main(["--format", "jsonl", "setup-pipeline"], rt)).toBe(0);
    const readiness = rt.stdout
      .text()
      .trimEnd()
      .split("\n")
      .map((line) => JSON.parse(line))
      .filter((entry) => entry.code === "READINESS");
    expect(readiness).toHaveLength(12);
    expect(readiness.slice(0, 4)).toEqual([
      {
        level: "info",
        code: "READINESS",
        message: "deployment/openshift-pipelines-operator (openshift-operators): pending",
        resource: "deployment/openshift-pipelines-operator (openshift-operators)",
        state: "pending",
      },
      {
        level: "info",
        code: "READINESS",
        message: "deployment/openshift-pipelines-operator (openshift-operators): ready",
        resource: "deployment/openshift-pipelines-operator (openshift-operators)",
        state: "ready",
      },
      { level: "info", code: "READINESS", message: "project/openshift-pipelines: pending", resource: "project/openshift-pipelines", state: "pending" },
      { level: "info", code: "READINESS", message: "project/openshift-pipelines: ready", resource: "project/openshift-pipelines", state: "ready" },
    ]);
  });

  it("treats a failed rollout as fatal", async () => {
    const runner = readyCluster().on("rollout status", { exitCode: 1 });
    const rt = testRuntime(runner);

    expect(await main(["setup-pipeline"], rt)).toBe(1);
    expect(rt.stderr.text()).toBe(
      "ERROR: oc rollout status -w deployment openshift-pipelines-operator -n openshift-operators exited with 1\n",
    );
    expect(runner.lines().some((l) => l.includes("apply"))).toBe(false);
  });
});

describe("run", () => {
  it("starts api and ui builds and passes when every run succeeded", async () => {
    const runner = new FakeRunner().on(
      "get pipelinerun.tekton.dev",
      { stdout: pipelineRuns(["api-run", "Succeeded", "True"], ["ui-run", "Succeeded", "True"]) },
    );
    const rt = testRuntime(runner);

    expect(await main(["run"], rt)).toBe(0);
    expect(runner.calls.filter((c) => c.mode === "stream").map((c) => c.line)).toEqual([
      "tkn -n pipelines-tutorial pipeline start build-and-deploy -r git-repo=api-repo -r image=api-image -p deployment-name=vote-api --showlog=true",
      "tkn -n pipelines-tutorial pipeline start build-and-deploy -r git-repo=ui-repo -r image=ui-image -p deployment-name=vote-ui --showlog=true",
    ]);
    expect(rt.stderr.text()).toBe("");
  });

  it("exits 1 naming every run that did not succeed", async () => {
    const runner = new FakeRunner().on(
      "get pipelinerun.tekton.dev",
      { stdout: pipelineRuns(["A", "Succeeded", "True"], ["B", "Succeeded", "False"]) },
    );
    const rt = testRuntime(runner);

    expect(await main(["run"], rt)).toBe(1);
    expect(rt.stderr.text()).toBe("ERROR: test B=SucceededFalse but should be SucceededTrue\n");
  });

  it("passes with no pipeline runs", async () => {
    const runner = new FakeRunner().on("get pipelinerun.tekton.dev", { stdout: pipelineRuns() });
    expect(await main(["run"], testRuntime(runner))).toBe(0);
  });

  it("previews the namespaced start commands on --dry-run", async () => {
    const rt = testRuntime(new FakeRunner(), { NAMESPACE: "demo-ns" });

    expect(await main(["--dry-run", "run"], rt)).toBe(0);
    expect(rt.runner.calls).toEqual([]);
    expect(rt.stdout.text()).toBe(
      "\nINFO: Running API Build and deploy\n" +
        "[dry-run] tkn -n demo-ns pipeline start build-and-deploy -r git-repo=api-repo -r image=api-image -p deployment-name=vote-api --showlog=true\n" +
        "\nINFO: Running UI Build and deploy\n" +
        "[dry-run] tkn -n demo-ns pipeline start build-and-deploy -r git-repo=ui-repo -r image=ui-image -p deployment-name=vote-ui --showlog=true\n",
    );
  });

  it("stops when a pipeline start fails", async () => {
    const runner = new FakeRunner().on("pipeline start", { exitCode: 1 });
    const rt = testRuntime(runner);

    expect(await main(["run"], rt)).toBe(1);
    expect(runner.calls).toHaveLength(1);
  });

  it("emits failures as JSON lines", async () => {
    const runner = new FakeRunner().on("get pipelinerun.tekton.dev", { stdout: pipelineRuns(["B", "Failed", "False"]) });
    const rt = testRuntime(runner);

    expect(await main(["--format", "jsonl", "run"], rt)).toBe(1);
    expect(JSON.parse(rt.stderr.text())).toEqual({
      level: "error",
      code: "PIPELINERUN_FAILED",
      message: "test B=FailedFalse but should be SucceededTrue",
      run: "B",
      observed: "FailedFalse",
    });
  });
});

describe("logs and urls", () => {
  it("follows the last run and returns the tkn exit code", async () => {
    const runner = new FakeRunner().on("pipeline logs", { exitCode: 2 });
    const rt = testRuntime(runner);

    expect(await main(["logs"], rt)).toBe(2);
    expect(runner.calls).toEqual([
      { mode: "stream", line: "tkn -n pipelines-tutorial pipeline logs build-and-deploy --last -f" },
    ]);
  });

  it("prints the application URL", async () => {
    const runner = new FakeRunner().on("get route vote-ui -o jsonpath={.spec.host}", {
      stdout: "vote-ui-pipelines-tutorial.apps.example.test",
    });
    const rt = testRuntime(runner);

    expect(await main(["url"], rt)).toBe(0);
    expect(rt.stdout.text()).toBe(
      "Click following URL to access the application\nhttp://vote-ui-pipelines-tutorial.apps.example.test\n",
    );
  });

  it("prints a bare http:// webhook URL when no route exists yet", async () => {
    const rt = testRuntime(new FakeRunner());

    expect(await main(["webhook-url"], rt)).toBe(0);
    expect(rt.stdout.text()).toBe("\nINFO: Webhook URL: http://\n");
  });

  it("reports the webhook URL as a JSON line", async () => {
    const runner = new FakeRunner()
      .on("get route -l", { stdout: "route.route.openshift.io/el-vote-app\n" })
      .on("jsonpath={.spec.host}", { stdout: "hooks.apps.example.test" });
    const rt = testRuntime(runner);

    expect(await main(["--format", "jsonl", "webhook-url"], rt)).toBe(0);
    expect(JSON.parse(rt.stdout.text())).toEqual({
      level: "info",
      code: "INFO",
      message: "Webhook URL: http://hooks.apps.example.test",
      url: "http://hooks.apps.example.test",
    });
  });
});
