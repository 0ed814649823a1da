import { Queue, type QueueOptions } from 'bullmq'
import IORedis, { Redis } from 'ioredis'
import { loadConfig } from './config'

export const PERFORMANCE_QUEUE = 'performance.process'

export interface AdjustJob {
  kind: 'adjust'
  person: string
  referenceDir?: string
  sourceDir?: string
  clear: boolean
}

export interface CompileJob {
  kind: 'compile'
  referenceDir: string
  sourceDir?: string
  fps?: number
  stitchAll: boolean
}

export interface CleanJob {
  kind: 'clean'
  referenceDir: string
}

export type PerformanceJob = AdjustJob | CompileJob | CleanJob

let redisInstance: Redis | null = null
let performanceQueueInstance: Queue<PerformanceJob> | null = null

export function connection() {
  if (!redisInstance) {
    redisInstance = new IORedis(loadConfig().redisUrl, {
      maxRetriesPerRequest: null
    })
  }

  return redisInstance
}

export function performanceQueue() {
  if (!performanceQueueInstance) {
    const queueOptions: QueueOptions = {
      connection: connection()
    }

    performanceQueueInstance = new Queue<PerformanceJob>(PERFORMANCE_QUEUE, queueOptions)
  }

  return performanceQueueInstance
}
