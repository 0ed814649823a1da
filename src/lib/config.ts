import path from 'path'

export interface PipelineConfig {
  referenceFps: number
  ffmpegPath: string
  modelsDir: string
  landmarkConfidence: number
  tfBackend: 'wasm' | 'cpu'
  bucketRetries: number
  redisUrl: string
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name]
  if (raw === undefined || raw.trim() === '')
  {
    return fallback
  }
  const value = Number(raw)
  return Number.isFinite(value) ? value : fallback
}

export function loadConfig(): PipelineConfig {
  const backend = process.env.TF_BACKEND === 'cpu' ? 'cpu' : 'wasm'

  return {
    referenceFps: Math.max(1, Math.round(readNumber('REFERENCE_FPS', 12))),
    ffmpegPath: process.env.FFMPEG_PATH || 'ffmpeg',
    modelsDir: process.env.MODELS_DIR || path.join(process.cwd(), 'models'),
    landmarkConfidence: Math.max(0, Math.min(1, readNumber('LANDMARK_CONF', 0.5))),
    tfBackend: backend,
    bucketRetries: Math.max(0, Math.floor(readNumber('BUCKET_RETRIES', 1))),
    redisUrl: process.env.REDIS_URL || 'redis://localhost:6379'
  }
}
