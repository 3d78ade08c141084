import ffmpeg from "fluent-ffmpeg";
import { env } from "@/config/env";

// Set ffmpeg and ffprobe paths
ffmpeg.setFfmpegPath(env.FFMPEG_PATH);
ffmpeg.setFfprobePath(env.FFPROBE_PATH);

export { ffmpeg };
