import { describe, it, expect } from "vitest";
import { resolvePipelineOptions } from "../src/cli/options.js";
import { parseClusterConfig } from "../src/config/clusterConfig.js";
import type { JobContext } from "../src/execution/slurm/jobContext.js";
import { planTaskLayout, safeJoin } from "../src/task/layout.js";
import { buildPipelineArgs } from "../src/task/pipeline.js";
import { templatePaths } from "../src/task/templates.js";

const job: JobContext = {
  submitHost: "login1",
  nodeName: "node07",
  submitDir: "/home/u/run",
  jobName: "study_RPP_linear_3T_MPP",
  arrayJobId: "1000",
  arrayTaskId: 2,
  jobId: "1002",
  nodeList: "node07"
};

const options = resolvePipelineOptions({ studyFolder: "/data/study", subjects: "101 102" });

describe("task layout", () => {
  it("derives every scratch and permanent path from options, config and job", () => {
    const config = parseClusterConfig(
      { version: 1, paths: { scratch_root: "/scratch", toolset_dir: "/opt/mpp" } },
      { env: {} }
    );
    const scratch = "/scratch/SLURM_RPP_linear_3T_101_1002";

    expect(planTaskLayout({ options, config, job, subjectId: "101" })).toEqual({
      subjectId: "101",
      studyName: "study",
      scratchDir: scratch,
      scratchLogDir: `${scratch}/logs`,
      toolsetDir: "/opt/mpp",
      stagedToolsetDir: `${scratch}/mpp`,
      pipelineEntry: `${scratch}/mpp/MPP.sh`,
      rawSubjectDir: "/data/study/raw/101",
      stagedSubjectDir: `${scratch}/101`,
      stagedOutputDir: `${scratch}/study/preprocessed/RPP/linear/3T/101`,
      permanentOutputDir: "/data/study/preprocessed/RPP/linear/3T/101",
      studyLogDir: "/data/study/logs/RPP/linear/3T",
      schedulerLogDir: "/home/u/run/logs/slurm/RPP/linear/3T",
      schedulerCaptures: [
        {
          source: "/home/u/run/logs/slurm/slurm-1000_2.out",
          relocated: "/home/u/run/logs/slurm/RPP/linear/3T/slurm-101.out"
        },
        {
          source: "/home/u/run/logs/slurm/slurm-1000_2.err",
          relocated: "/home/u/run/logs/slurm/RPP/linear/3T/slurm-101.err"
        }
      ]
    });
  });

  it("stages the submit directory when no toolset is configured", () => {
    const config = parseClusterConfig({ version: 1 }, { env: {} });
    const layout = planTaskLayout({ options, config, job, subjectId: "102" });
    expect(layout.toolsetDir).toBe("/home/u/run");
    expect(layout.pipelineEntry).toBe("/tmp/work/SLURM_RPP_linear_3T_102_1002/run/MPP.sh");
  });

  it("keeps task paths inside their base directories", () => {
    expect(() => safeJoin("/scratch", "../etc")).toThrow("unsafe task path: ../etc");
    expect(() => safeJoin("/scratch", ".")).toThrow("unsafe task path: .");
    const config = parseClusterConfig({ version: 1, pipeline: { entry: "../MPP.sh" } }, { env: {} });
    expect(() => planTaskLayout({ options, config, job, subjectId: "101" })).toThrow("unsafe task path: ../MPP.sh");
  });

  it("builds the pipeline argument list", () => {
    const config = parseClusterConfig(
      { version: 1, paths: { scratch_root: "/scratch", template_root: "/mni", pipeline_config_root: "/mppcfg" } },
      { env: {} }
    );
    const layout = planTaskLayout({ options: { ...options, brainSize: 120 }, config, job, subjectId: "101" });
    const args = buildPipelineArgs({
      options: { ...options, brainSize: 120 },
      layout,
      templates: templatePaths(config),
      images: { xInputImages: "/s/a.nii.gz@/s/b.nii.gz", yInputImages: "" }
    });

    expect(args).toHaveLength(22);
    expect(args.slice(0, 7)).toEqual([
      "--studyName=study",
      "--subject=101",
      "--class=3T",
      "--domainX=T1w_MPR",
      "--domainY=T2w_SPC",
      "--x=/s/a.nii.gz@/s/b.nii.gz",
      "--y="
    ]);
    expect(args).toContain("--xTemplate=/mni/MNI152_T1_0.7mm.nii.gz");
    expect(args).toContain("--template2mmMask=/mni/MNI152_T1_2mm_brain_mask_dil.nii.gz");
    expect(args).toContain("--brainSize=120");
    expect(args).toContain("--FNIRTConfig=/mppcfg/T1_2_MNI152_2mm.cnf");
    expect(args[args.length - 1]).toBe("--printcom=");
  });

  it("requires template locations", () => {
    expect(() => templatePaths(parseClusterConfig({ version: 1 }, { env: {} }))).toThrow(
      "paths.template_root is not configured (set MNI_Templates)"
    );
  });
});
