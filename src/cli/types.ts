export interface ScanCommandOptions {
  output?: string
  summaryOutput?: string
  config?: string
  timeout?: number
  azPath?: string
  include?: string[]
  exclude?: string[]
  skipPrerequisites?: boolean
  verbose?: boolean
}
