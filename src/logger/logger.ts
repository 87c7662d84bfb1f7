import pino from "pino";

/**
 * Logger instance for structured logs.
 *
 * Pretty output on an interactive terminal, JSON lines on stderr otherwise so
 * piped runs and test reporters keep stdout to themselves.
 */
export const logger = process.stderr.isTTY
  ? pino({
      transport: { target: "pino-pretty" },
      level: process.env.LOG_LEVEL ?? "info",
    })
  : pino({ level: process.env.LOG_LEVEL ?? "info" }, pino.destination(2));

export type StepLogLevel = "info" | "warning" | "error" | "debug";

export interface StepLogMessage {
  step: string;
  level: StepLogLevel;
  message: string;
}

/**
 * Logs a message on behalf of a pipeline step.
 *
 * The step name prefixes the message so interleaved output from the prompt and
 * render pipelines stays attributable:
 *
 * ```typescript
 * logMessage({
 *   step: "renderScenes",
 *   level: "info",
 *   message: "Scene 3 saved to video_generation_workspace/scene_3.mp4",
 * });
 * ```
 */
export function logMessage(logMessage: StepLogMessage): void {
  const message = `${logMessage.step} :: ${logMessage.message}`;

  if (logMessage.level === "error") logger.error(message);
  else if (logMessage.level === "warning") logger.warn(message);
  else if (logMessage.level === "debug") logger.debug(message);
  else logger.info(message);
}
