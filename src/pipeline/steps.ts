import type { PipelineStep, StepCommand, StepContext, StepSelection } from './types.js'

export const STEP_COUNT = 7
export const DATABASE_FILENAME = 'database.db'
export const CONTAINER_WORKDIR = '/workspace'

export const sparseModelPath = (imageDirName: string) => `${imageDirName}/sparse/0`
export const fusedCloudPath = (imageDirName: string) => `${imageDirName}/dense/fused.ply`
export const meshPath = (imageDirName: string) => `${imageDirName}/dense/meshed-poisson.ply`

export const PIPELINE_STEPS: readonly PipelineStep[] = Object.freeze([
  {
    number: 1,
    name: 'Feature Extraction',
    category: 'sparse',
    subcommand: 'feature_extractor',
    buildArgs: ({ imageDirName }) => [
      '--database_path',
      DATABASE_FILENAME,
      '--image_path',
      imageDirName,
    ],
  },
  {
    number: 2,
    name: 'Feature Matching',
    category: 'sparse',
    subcommand: 'exhaustive_matcher',
    buildArgs: () => ['--database_path', DATABASE_FILENAME],
  },
  {
    number: 3,
    name: 'Sparse Reconstruction',
    category: 'sparse',
    subcommand: 'mapper',
    buildArgs: ({ imageDirName }) => [
      '--database_path',
      DATABASE_FILENAME,
      '--image_path',
      `${imageDirName}/`,
      '--output_path',
      `${imageDirName}/sparse/`,
    ],
  },
  {
    number: 4,
    name: 'Image Undistortion',
    category: 'dense',
    subcommand: 'image_undistorter',
    buildArgs: ({ imageDirName, maxImageSize }) => [
      '--image_path',
      `${imageDirName}/`,
      '--input_path',
      sparseModelPath(imageDirName),
      '--output_path',
      `${imageDirName}/dense`,
      '--output_type',
      'COLMAP',
      '--max_image_size',
      String(maxImageSize),
    ],
  },
  {
    number: 5,
    name: 'Patch Match Stereo',
    category: 'dense',
    subcommand: 'patch_match_stereo',
    buildArgs: ({ imageDirName }) => [
      '--workspace_path',
      `${imageDirName}/dense`,
      '--workspace_format',
      'COLMAP',
      '--PatchMatchStereo.geom_consistency',
      'true',
    ],
  },
  {
    number: 6,
    name: 'Stereo Fusion',
    category: 'dense',
    subcommand: 'stereo_fusion',
    buildArgs: ({ imageDirName }) => [
      '--workspace_path',
      `${imageDirName}/dense`,
      '--workspace_format',
      'COLMAP',
      '--input_type',
      'geometric',
      '--output_path',
      fusedCloudPath(imageDirName),
    ],
  },
  {
    number: 7,
    name: 'Poisson Meshing',
    category: 'mesh',
    subcommand: 'poisson_mesher',
    buildArgs: ({ imageDirName }) => [
      '--input_path',
      fusedCloudPath(imageDirName),
      '--output_path',
      meshPath(imageDirName),
    ],
  },
] satisfies PipelineStep[])

export function formatStepLabel(step: Pick<PipelineStep, 'number' | 'name'>): string {
  return `${step.number}/${STEP_COUNT} - ${step.name}`
}

export function buildStepCommand(step: PipelineStep, context: StepContext): StepCommand {
  return {
    command: context.dockerPath,
    args: [
      'run',
      '--rm',
      ...(context.gpus ? ['--gpus', 'all'] : []),
      '-v',
      `${context.workDir}:${CONTAINER_WORKDIR}`,
      '-w',
      CONTAINER_WORKDIR,
      context.dockerImage,
      'colmap',
      step.subcommand,
      ...step.buildArgs(context),
    ],
  }
}

/**
 * Steps to run for a selection, in ascending order. A single `step` overrides the
 * range; dense steps drop out with skipDense, the mesh step with skipDense or skipMesh.
 */
export function selectSteps(
  steps: readonly PipelineStep[],
  selection: StepSelection
): PipelineStep[] {
  const start = selection.step ?? selection.startFrom
  const stop = selection.step ?? selection.stopAt
  return steps
    .filter((step) => {
      if (step.number < start || step.number > stop) return false
      if (step.category === 'dense') return !selection.skipDense
      if (step.category === 'mesh') return !selection.skipDense && !selection.skipMesh
      return true
    })
    .sort((a, b) => a.number - b.number)
}
