export type StepCategory = 'sparse' | 'dense' | 'mesh'

/** Everything a step needs to build its container invocation. */
export type StepContext = {
  /** Absolute directory bind-mounted into the container; parent of the images. */
  workDir: string
  /** Image directory name, relative to workDir. */
  imageDirName: string
  dockerImage: string
  dockerPath: string
  maxImageSize: number
  gpus: boolean
}

export type PipelineStep = {
  number: number
  name: string
  category: StepCategory
  /** `colmap` subcommand. */
  subcommand: string
  buildArgs: (context: StepContext) => string[]
}

export type StepCommand = {
  command: string
  args: string[]
}

export type StepSelection = {
  startFrom: number
  stopAt: number
  step: number | null
  skipDense: boolean
  skipMesh: boolean
}

export type StepStatus = {
  number: number
  name: string
  completed: boolean
}
