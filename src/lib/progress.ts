const WINDOW_SIZE = 50

/**
 * Run-scoped progress state. One is created per adjust or compile run and
 * passed down explicitly, so nothing about timing lives in module globals.
 */
export interface RunContext {
  tag: string
  label: string
  total: number
  completed: number
  durations: number[]
}

export function createRunContext(tag: string, label: string, total: number, alreadyDone = 0): RunContext {
  return { tag, label, total, completed: alreadyDone, durations: [] }
}

export function recordStep(ctx: RunContext, durationMs: number): void {
  ctx.completed++
  ctx.durations.unshift(durationMs)
  if (ctx.durations.length > WINDOW_SIZE)
  {
    ctx.durations.length = WINDOW_SIZE
  }
}

export function percentComplete(ctx: RunContext): number {
  if (ctx.total <= 0)
  {
    return 100
  }
  return Math.round((ctx.completed / ctx.total) * 100000) / 1000
}

export function estimateRemainingMs(ctx: RunContext): number {
  if (ctx.durations.length === 0)
  {
    return 0
  }
  const mean = ctx.durations.reduce((a, b) => a + b, 0) / ctx.durations.length
  return Math.max(0, ctx.total - ctx.completed) * mean
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000)
  const h = Math.floor(totalSeconds / 3600)
  const m = Math.floor((totalSeconds % 3600) / 60)
  const s = totalSeconds % 60
  return `${h}:${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}`
}

export function logStep(ctx: RunContext, item: string, durationMs: number): void {
  console.log(
    `[${ctx.tag}] ${ctx.label}: ${item} in ${durationMs.toFixed(0)}ms | Progress: ${percentComplete(ctx).toFixed(3)}% | Time left: ${formatDuration(estimateRemainingMs(ctx))}`
  )
}
