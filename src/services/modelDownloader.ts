import { promises as fs } from "fs";
import path from "path";
import https from "https";

export const MODEL_FILES = [
  "ssd_mobilenetv1_model-weights_manifest.json",
  "ssd_mobilenetv1_model.bin",
  "face_landmark_68_model-weights_manifest.json",
  "face_landmark_68_model.bin",
];

const BASE_URL = "https://vladmandic.github.io/face-api/model/";

async function downloadFile(url: string, dest: string): Promise<void> {
  return new Promise((resolve, reject) => {
    https
      .get(url, (response) => {
        if (response.statusCode !== 200) {
          response.resume();
          reject(
            new Error(`Failed to download ${url}: ${response.statusCode}`)
          );
          return;
        }

        const chunks: Buffer[] = [];
        response.on("data", (chunk: Buffer) => chunks.push(chunk));
        response.on("end", () => {
          fs.writeFile(dest, Buffer.concat(chunks)).then(resolve, reject);
        });
      })
      .on("error", reject);
  });
}

export async function missingModelFiles(modelsPath: string): Promise<string[]> {
  const present: string[] = await fs.readdir(modelsPath).catch(() => []);
  return MODEL_FILES.filter((file) => !present.includes(file));
}

export async function ensureModelsDownloaded(modelsPath: string): Promise<void> {
  await fs.mkdir(modelsPath, { recursive: true });

  const missing = await missingModelFiles(modelsPath);
  if (missing.length === 0) {
    console.log("[Landmarks] Models already exist");
    return;
  }

  console.log(`[Landmarks] Downloading ${missing.length} model files...`);

  for (const file of missing) {
    const url = BASE_URL + file;
    const dest = path.join(modelsPath, file);

    try {
      await downloadFile(url, dest);
      console.log(`[Landmarks] Downloaded ${file}`);
    } catch (error) {
      console.error(`[Landmarks] Error downloading ${file}:`, error);
      throw error;
    }
  }

  console.log("[Landmarks] All models downloaded successfully");
}
