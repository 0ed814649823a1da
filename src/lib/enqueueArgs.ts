import path from 'path'
import type { PerformanceJob } from './queue'

const VALUE_FLAGS = new Set(['--source', '--fps'])

interface ParsedArgs {
  positional: string[]
  switches: Set<string>
  values: Map<string, string>
}

function splitArgs(argv: string[]): ParsedArgs | null {
  const positional: string[] = []
  const switches = new Set<string>()
  const values = new Map<string, string>()

  for (let i = 0; i < argv.length; i++)
  {
    const arg = argv[i]
    if (VALUE_FLAGS.has(arg))
    {
      const value = argv[i + 1]
      if (value === undefined || value.startsWith('--'))
      {
        return null
      }
      values.set(arg, value)
      i++
    }
    else if (arg.startsWith('--'))
    {
      switches.add(arg)
    }
    else
    {
      positional.push(arg)
    }
  }
  return { positional, switches, values }
}

/**
 * Turns enqueue-run arguments into a job payload, or null when they do not
 * form one.
 *
 *   adjust <referenceDir> <person> [--clear] [--source <dir>]
 *   compile <referenceDir> [--stitch] [--source <dir>] [--fps <n>]
 *   clean <referenceDir>
 */
export function parseEnqueueArgs(argv: string[]): PerformanceJob | null {
  const parsed = splitArgs(argv)
  if (!parsed)
  {
    return null
  }
  const [kind, target, person] = parsed.positional
  if (!target)
  {
    return null
  }
  const referenceDir = path.resolve(target)
  const source = parsed.values.get('--source')
  const sourceDir = source === undefined ? undefined : path.resolve(source)

  if (kind === 'adjust' && person)
  {
    return {
      kind: 'adjust',
      referenceDir,
      sourceDir,
      person,
      clear: parsed.switches.has('--clear')
    }
  }
  if (kind === 'compile')
  {
    const rawFps = parsed.values.get('--fps')
    let fps: number | undefined
    if (rawFps !== undefined)
    {
      fps = Number(rawFps)
      if (!Number.isInteger(fps) || fps < 1)
      {
        return null
      }
    }
    return {
      kind: 'compile',
      referenceDir,
      sourceDir,
      fps,
      stitchAll: parsed.switches.has('--stitch')
    }
  }
  if (kind === 'clean')
  {
    return { kind: 'clean', referenceDir }
  }
  return null
}
