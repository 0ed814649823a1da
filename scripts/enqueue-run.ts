import { parseEnqueueArgs } from '../src/lib/enqueueArgs'
import { performanceQueue, type PerformanceJob } from '../src/lib/queue'

function usage(): never {
  console.error('Usage: tsx scripts/enqueue-run.ts adjust <referenceDir> <person> [--clear] [--source <dir>]')
  console.error('       tsx scripts/enqueue-run.ts compile <referenceDir> [--stitch] [--source <dir>] [--fps <n>]')
  console.error('       tsx scripts/enqueue-run.ts clean <referenceDir>')
  process.exit(1)
}

function buildJob(): PerformanceJob {
  return parseEnqueueArgs(process.argv.slice(2)) ?? usage()
}

async function enqueue() {
  const job = buildJob()
  try {
    await performanceQueue().add(job.kind, job)
    const scope = job.kind === 'clean' ? job.referenceDir : job.sourceDir ?? job.referenceDir
    console.log(`Job added to queue: ${job.kind} ${scope}`)
    process.exit(0)
  }
  catch (error) {
    console.error('Error adding job:', error)
    process.exit(1)
  }
}

enqueue().catch((error) => {
  console.error('Fatal error:', error)
  process.exit(1)
})
