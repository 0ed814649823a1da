import { Worker } from "bullmq";
import { connection, PERFORMANCE_QUEUE, type PerformanceJob } from "./lib/queue";
import { clearBucketDirectories } from "./lib/cleanup";
import { loadConfig, type PipelineConfig } from "./lib/config";
import { MissingInputError } from "./lib/errors";
import { adjustSource, adjustSources } from "./services/adjust";
import { runCompile } from "./services/compile/compile";
import { FaceApiLandmarkDetector } from "./services/detectors/landmarkDetector";
import type { LandmarkDetector } from "./services/detectors/landmarks";
import { FfmpegTranscoder } from "./services/ffmpeg";
import { ensureModelsDownloaded } from "./services/modelDownloader";

export async function processJob(
  data: PerformanceJob,
  config: PipelineConfig,
  detector: LandmarkDetector,
): Promise<void> {
  if (data.kind === "clean") {
    clearBucketDirectories(data.referenceDir);
    return;
  }

  if (data.kind === "adjust") {
    const options = { person: data.person, clear: data.clear, detector };
    if (data.sourceDir) {
      await adjustSource(data.sourceDir, options);
      return;
    }
    if (!data.referenceDir) {
      throw new Error("Adjust job needs a sourceDir or a referenceDir");
    }
    await adjustSources(data.referenceDir, options);
    return;
  }

  const result = await runCompile({
    referenceDir: data.referenceDir,
    sourceDir: data.sourceDir,
    stitchAll: data.stitchAll,
    fps: data.fps ?? config.referenceFps,
    bucketRetries: config.bucketRetries,
    transcoder: new FfmpegTranscoder(config.ffmpegPath),
  });

  if (result.sources.length === 0) {
    throw new Error(`No source in ${data.referenceDir} could be compiled`);
  }
}

async function initializeWorker() {
  console.log("[Worker] Initializing worker...");

  const config = loadConfig();
  const detector = new FaceApiLandmarkDetector({
    modelsDir: config.modelsDir,
    minConfidence: config.landmarkConfidence,
    backend: config.tfBackend,
  });

  try {
    await ensureModelsDownloaded(config.modelsDir);
    await detector.initialize();
    console.log("[Worker] Landmark models initialized successfully");
  } catch (error) {
    console.error("[Worker] Failed to initialize landmark models:", error);
    throw error;
  }

  const worker = new Worker<PerformanceJob>(
    PERFORMANCE_QUEUE,
    (job) => processJob(job.data, config, detector),
    {
      connection: connection(),
      concurrency: 1,
      lockDuration: 1800000,
      lockRenewTime: 30000,
    },
  );

  worker.on("completed", (job) => {
    console.log(`[Worker] Job ${job.id} (${job.data.kind}) completed`);
  });

  worker.on("failed", (job, err) => {
    if (err instanceof MissingInputError) {
      console.error(`[Worker] Job ${job?.id} is missing input ${err.path}`);
      return;
    }
    console.error(`[Worker] Job ${job?.id} failed:`, err);
  });

  console.log("[Worker] Worker started and ready to process jobs");
}

if (require.main === module) {
  initializeWorker().catch((error) => {
    console.error("[Worker] Failed to initialize worker:", error);
    process.exit(1);
  });
}
