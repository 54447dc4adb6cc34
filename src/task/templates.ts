import { promises as fs } from "fs";
import path from "path";
import type { ClusterConfig } from "../config/clusterConfig.js";
import { ErrorCode, MppError } from "../core/errors.js";

export interface TemplatePaths {
  xTemplate: string;
  xTemplateBrain: string;
  xTemplate2mm: string;
  yTemplate: string;
  yTemplateBrain: string;
  yTemplate2mm: string;
  templateMask: string;
  template2mmMask: string;
  fnirtConfig: string;
}

export const TEMPLATE_FILES = {
  xTemplate: "MNI152_T1_0.7mm.nii.gz",
  xTemplateBrain: "MNI152_T1_0.7mm_brain.nii.gz",
  xTemplate2mm: "MNI152_T1_2mm.nii.gz",
  yTemplate: "MNI152_T2_0.7mm.nii.gz",
  yTemplateBrain: "MNI152_T2_0.7mm_brain.nii.gz",
  yTemplate2mm: "MNI152_T2_2mm.nii.gz",
  templateMask: "MNI152_T1_0.7mm_brain_mask.nii.gz",
  template2mmMask: "MNI152_T1_2mm_brain_mask_dil.nii.gz"
} as const;

export const FNIRT_CONFIG_FILE = "T1_2_MNI152_2mm.cnf";

export function templatePaths(config: ClusterConfig): TemplatePaths {
  if (!config.templateRoot) {
    throw new MppError(ErrorCode.Config, "paths.template_root is not configured (set MNI_Templates)");
  }
  if (!config.pipelineConfigRoot) {
    throw new MppError(ErrorCode.Config, "paths.pipeline_config_root is not configured (set MPP_Config)");
  }
  const root = config.templateRoot;
  return {
    xTemplate: path.join(root, TEMPLATE_FILES.xTemplate),
    xTemplateBrain: path.join(root, TEMPLATE_FILES.xTemplateBrain),
    xTemplate2mm: path.join(root, TEMPLATE_FILES.xTemplate2mm),
    yTemplate: path.join(root, TEMPLATE_FILES.yTemplate),
    yTemplateBrain: path.join(root, TEMPLATE_FILES.yTemplateBrain),
    yTemplate2mm: path.join(root, TEMPLATE_FILES.yTemplate2mm),
    templateMask: path.join(root, TEMPLATE_FILES.templateMask),
    template2mmMask: path.join(root, TEMPLATE_FILES.template2mmMask),
    fnirtConfig: path.join(config.pipelineConfigRoot, FNIRT_CONFIG_FILE)
  };
}

/** Templates are shared and read-only; the task only checks that each one is there. */
export async function resolveTemplates(config: ClusterConfig): Promise<TemplatePaths> {
  const paths = templatePaths(config);
  const missing: string[] = [];
  for (const p of Object.values(paths)) {
    try {
      await fs.access(p);
    } catch {
      missing.push(p);
    }
  }
  if (missing.length) {
    throw new MppError(ErrorCode.Config, `missing template file(s): ${missing.join(", ")}`);
  }
  return paths;
}
