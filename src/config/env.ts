import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  // Runtime
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  // External tools
  FFMPEG_PATH: z.string().default("ffmpeg"),
  FFPROBE_PATH: z.string().default("ffprobe"),
  REALSR_PATH: z.string().default("./realsr-ncnn"),
  REALCUGAN_PATH: z.string().default("./realcugan-ncnn"),
  MODELS_DIR: z.string().default("models"),

  // Working directories
  WORK_DIR: z.string().default("."),
  TMP_FRAMES_DIR: z.string().default("tmp_frames"),
  OUT_FRAMES_DIR: z.string().default("out_frames"),
  UPSCALE_LOG_FILE: z.string().default("upscaling.log"),

  // Frame extraction
  DEFAULT_FRAME_RATE: z
    .string()
    .default("23.98")
    .transform(Number)
    .pipe(z.number().positive()),

  // Progress
  PROGRESS_INTERVAL_MS: z
    .string()
    .default("1000")
    .transform(Number)
    .pipe(z.number().int().positive()),
});

function loadEnv() {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
export type Env = z.infer<typeof envSchema>;
