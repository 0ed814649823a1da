export class MissingInputError extends Error {
  readonly path: string

  constructor(what: string, missingPath: string) {
    super(`${what} not found: ${missingPath}`)
    this.name = 'MissingInputError'
    this.path = missingPath
  }
}

export class TranscoderError extends Error {
  readonly command: string
  readonly exitCode: number | null

  constructor(command: string, exitCode: number | null, output: string) {
    super(`${command} exited with code ${exitCode}: ${output.trim().slice(-2000)}`)
    this.name = 'TranscoderError'
    this.command = command
    this.exitCode = exitCode
  }
}
