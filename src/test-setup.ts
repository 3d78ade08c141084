import { afterAll } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

const TEST_WORK_DIR = mkdtempSync(join(tmpdir(), "upscale-video-test-"));

// Set test environment before env.ts parses it
process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = "silent";
process.env.WORK_DIR = TEST_WORK_DIR;
process.env.FFMPEG_PATH = "ffmpeg";
process.env.FFPROBE_PATH = "ffprobe";
process.env.REALSR_PATH = "./realsr-ncnn";
process.env.REALCUGAN_PATH = "./realcugan-ncnn";
process.env.MODELS_DIR = "models";
process.env.PROGRESS_INTERVAL_MS = "1000";

afterAll(() => {
  rmSync(TEST_WORK_DIR, { recursive: true, force: true });
});
