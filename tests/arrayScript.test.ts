import { describe, it, expect } from "vitest";
import { resolveSchedulerOptions } from "../src/cli/options.js";
import { bashSingleQuote, renderArrayScript, schedulerJobName } from "../src/execution/slurm/arrayScript.js";

describe("sbatch array script", () => {
  const scheduler = resolveSchedulerOptions({});

  it("renders directives, environment and the runner command", () => {
    const script = renderArrayScript({
      jobName: "study_RPP_linear_3T_MPP",
      arraySpec: "1,2,3",
      scheduler,
      schedulerLogDir: "/home/u/run/logs/slurm",
      runnerArgv: ["mpp-task"],
      runnerArgs: ["--studyFolder=/data/study", "--printcom=it's"],
      env: { MPP_CLUSTER_CONFIG: "/etc/mpp/cluster.yaml" }
    });

    expect(script).toBe(
      [
        "#!/usr/bin/env bash",
        "#SBATCH --job-name=study_RPP_linear_3T_MPP",
        "#SBATCH --partition=standard",
        "#SBATCH --nodes=1",
        "#SBATCH --time=0-05:00:00",
        "#SBATCH --ntasks=1",
        "#SBATCH --mem=2gb",
        "#SBATCH --export=ALL",
        "#SBATCH --mail-type=FAIL,END",
        "#SBATCH --array=1,2,3",
        "#SBATCH --output=/home/u/run/logs/slurm/slurm-%A_%a.out",
        "#SBATCH --error=/home/u/run/logs/slurm/slurm-%A_%a.err",
        "",
        "set -euo pipefail",
        "",
        "export MPP_CLUSTER_CONFIG='/etc/mpp/cluster.yaml'",
        "",
        "exec 'mpp-task' \\",
        "  '--studyFolder=/data/study' \\",
        `  '--printcom=it'"'"'s'`,
        ""
      ].join("\n")
    );
  });

  it("emits exclude and mail-user only when set", () => {
    const script = renderArrayScript({
      jobName: "j",
      arraySpec: "1",
      scheduler: { ...scheduler, exclude: "node[01-02]", mailUser: "someone@example.org" },
      schedulerLogDir: "/logs",
      runnerArgv: ["node", "/opt/mpp/dist/scripts/run_task.js"],
      runnerArgs: []
    });
    const lines = script.split("\n");
    expect(lines).toContain("#SBATCH --exclude=node[01-02]");
    expect(lines).toContain("#SBATCH --mail-user=someone@example.org");
    expect(lines.filter((l) => l.startsWith("export "))).toEqual([]);
    expect(lines).toContain("exec 'node' \\");
    expect(lines).toContain("  '/opt/mpp/dist/scripts/run_task.js'");
  });

  it("refuses directive values that would break the header", () => {
    expect(() =>
      renderArrayScript({
        jobName: "j",
        arraySpec: "1",
        scheduler: { ...scheduler, mailUser: "a b" },
        schedulerLogDir: "/logs",
        runnerArgv: ["mpp-task"],
        runnerArgs: []
      })
    ).toThrow("invalid value for #SBATCH --mail-user: a b");
  });

  it("names the job after study, method, registration, class and job name", () => {
    expect(
      schedulerJobName({
        studyFolder: "/data/My Study/",
        brainExtractionMethod: "SPP",
        mniRegistrationMethod: "nonlinear",
        className: "7T",
        jobName: "MPP"
      })
    ).toBe("My-Study_SPP_nonlinear_7T_MPP");
  });

  it("single-quotes shell words", () => {
    expect(bashSingleQuote("plain")).toBe("'plain'");
    expect(bashSingleQuote("a b;$x")).toBe("'a b;$x'");
    expect(bashSingleQuote("it's")).toBe(`'it'"'"'s'`);
  });
});
