import pino from "pino";

/**
 * stdout goes through a transport outside production; in production pino
 * writes to stdout directly unless a log file needs a second target.
 */
export function buildTransportTargets(env: NodeJS.ProcessEnv): pino.TransportTargetOptions[] {
  const targets: pino.TransportTargetOptions[] = [];

  if (env.NODE_ENV !== "production" || env.LOG_FILE) {
    targets.push({ target: "pino/file", options: { destination: 1 } });
  }

  // Optional append-only log file alongside stdout
  if (env.LOG_FILE) {
    targets.push({
      target: "pino/file",
      options: { destination: env.LOG_FILE, mkdir: true, append: true },
    });
  }

  return targets;
}

const targets = buildTransportTargets(process.env);

export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport: targets.length > 0 ? { targets } : undefined,
});

export type Logger = pino.Logger;

export function createChildLogger(name: string): Logger {
  return logger.child({ component: name });
}
