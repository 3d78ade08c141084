/**
 * Upscale launcher
 * Starts realsr-ncnn or realcugan-ncnn in the background with its output appended to a log file
 */
import { spawn, type ChildProcess } from "child_process";
import { closeSync, openSync } from "fs";
import { env } from "@/config/env";
import type { UpscaleEngine } from "@/config/models";
import { logger } from "@/utils/logger";
import { buildEngineArgs } from "./upscaling.args";
import type { UpscaleExit, UpscaleJob, UpscaleLauncher, UpscaleProcess } from "./upscaling.types";

export interface UpscaleLauncherOptions {
  binaries?: Record<UpscaleEngine, string>;
  modelsDir?: string;
}

export class UpscaleLauncherService implements UpscaleLauncher {
  private readonly binaries: Record<UpscaleEngine, string>;
  private readonly modelsDir: string;

  constructor(options: UpscaleLauncherOptions = {}) {
    this.binaries = options.binaries ?? {
      realsr: env.REALSR_PATH,
      realcugan: env.REALCUGAN_PATH,
    };
    this.modelsDir = options.modelsDir ?? env.MODELS_DIR;
  }

  /**
   * Spawns the engine without waiting for it. Arguments are validated first,
   * so a bad job never starts a process.
   */
  launch(job: UpscaleJob): UpscaleProcess {
    const command = this.binaries[job.engine];
    const args = buildEngineArgs(job, this.modelsDir);

    logger.debug({ command, args, logFile: job.logFile }, "Starting upscaler");

    // The child keeps its own copy of the descriptor
    const logFd = openSync(job.logFile, "a");
    let child: ChildProcess;
    try {
      child = spawn(command, args, { stdio: ["ignore", logFd, logFd] });
    } finally {
      closeSync(logFd);
    }

    const startedAt = Date.now();
    let alive = true;

    const exited = new Promise<UpscaleExit>((resolve) => {
      child.once("error", (error) => {
        alive = false;
        logger.error({ command, error }, "Upscaler could not be started");
        resolve({ code: null, signal: null, error });
      });

      child.once("exit", (code, signal) => {
        alive = false;
        logger.debug({ command, code, signal }, "Upscaler exited");
        resolve({ code, signal });
      });
    });

    return {
      pid: child.pid,
      command,
      args,
      startedAt,
      exited,
      isAlive: () => alive,
      stop: () => {
        if (alive) {
          child.kill("SIGTERM");
        }
      },
    };
  }
}

export const upscaleLauncherService = new UpscaleLauncherService();
