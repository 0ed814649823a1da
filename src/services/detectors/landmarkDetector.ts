import type * as FaceApi from "@vladmandic/face-api";
import { ready, setBackend } from "@tensorflow/tfjs";
import { setWasmPaths } from "@tensorflow/tfjs-backend-wasm";
import * as path from "path";
import {
  groupLandmarks68,
  type FaceLandmarks,
  type LandmarkDetector,
  type RgbImage,
} from "./landmarks";

export interface FaceApiDetectorOptions {
  modelsDir: string;
  minConfidence: number;
  backend: "wasm" | "cpu";
}

type FaceApiModule = typeof FaceApi;

let faceApiInstance: FaceApiModule | null = null;

async function loadFaceApi(options: FaceApiDetectorOptions): Promise<FaceApiModule> {
  if (faceApiInstance) {
    return faceApiInstance;
  }
  // The default entry point pulls in tfjs-node; this build runs on plain tfjs.
  const faceapi: FaceApiModule = require("@vladmandic/face-api/dist/face-api.node-wasm.js");

  if (options.backend === "wasm") {
    const wasmDir = path.dirname(require.resolve("@tensorflow/tfjs-backend-wasm"));
    setWasmPaths(wasmDir + path.sep);
  }
  await setBackend(options.backend);
  await ready();

  await faceapi.nets.ssdMobilenetv1.loadFromDisk(options.modelsDir);
  await faceapi.nets.faceLandmark68Net.loadFromDisk(options.modelsDir);
  console.log(
    `[Landmarks] Loaded SSD MobileNet v1 and 68-point landmark models from ${options.modelsDir} (${options.backend} backend)`,
  );

  faceApiInstance = faceapi;
  return faceapi;
}

export class FaceApiLandmarkDetector implements LandmarkDetector {
  constructor(private readonly options: FaceApiDetectorOptions) {}

  async initialize(): Promise<void> {
    await loadFaceApi(this.options);
  }

  async detect(image: RgbImage): Promise<FaceLandmarks | null> {
    const faceapi = await loadFaceApi(this.options);
    const tensor = faceapi.tf.tensor3d(
      image.data,
      [image.height, image.width, 3],
      "int32",
    );
    try {
      const result = await faceapi
        .detectSingleFace(
          tensor,
          new faceapi.SsdMobilenetv1Options({
            minConfidence: this.options.minConfidence,
          }),
        )
        .withFaceLandmarks();

      if (!result) {
        return null;
      }
      return groupLandmarks68(result.landmarks.positions);
    } finally {
      tensor.dispose();
    }
  }
}
