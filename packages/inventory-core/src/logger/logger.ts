import pino from 'pino';
import { z } from 'zod';
import { jobLogLevelEnum, type NewJobLog } from '../schemas/job-log.schema';

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

type ConsoleLevel = z.infer<typeof logLevelSchema>;

const LEVEL_ORDER: readonly ConsoleLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Receives job-scoped log records (those carrying a `jobId`) at info and above
 */
export interface JobLogSink {
  record(entry: NewJobLog): void;
}

let jobLogSink: JobLogSink | null = null;

/**
 * Route job-scoped records of every logger to the sink, or stop with null
 */
export function setJobLogSink(sink: JobLogSink | null): void {
  jobLogSink = sink;
}

const jobLogLineSchema = z.object({
  jobId: z.string().uuid(),
  level: jobLogLevelEnum,
  msg: z.string().default(''),
  time: z.string().datetime({ offset: true }),
  error: z.unknown().optional()
});

const errorMessageSchema = z.object({ message: z.string() });

function errorDetail(error: unknown): string | undefined {
  if (typeof error === 'string') return error;
  const parsed = errorMessageSchema.safeParse(error);
  return parsed.success ? parsed.data.message : undefined;
}

/**
 * Job log entry for one serialized line, or null when the line is not job-scoped
 */
export function toJobLogEntry(line: string): NewJobLog | null {
  let record: unknown;
  try {
    record = JSON.parse(line);
  } catch {
    return null;
  }

  const parsed = jobLogLineSchema.safeParse(record);
  if (!parsed.success) return null;

  const { jobId, level, msg, time, error } = parsed.data;
  const detail = errorDetail(error);

  return {
    job_id: jobId,
    level,
    message: detail ? `${msg}: ${detail}` : msg,
    created_at: time
  };
}

const jobLogStream: pino.DestinationStream = {
  write(line: string) {
    if (!jobLogSink) return;
    const entry = toJobLogEntry(line);
    if (entry) jobLogSink.record(entry);
  }
};

/**
 * Logger factory - creates structured logger instances.
 * The console gets `LOG_LEVEL`; the job log always gets info and above.
 * `bindings` are attached to every record (e.g. instanceId).
 */
export function createLogger(serviceName: string, bindings: Record<string, unknown> = {}) {
  const consoleLevel = logLevelSchema.catch('info').parse(process.env.LOG_LEVEL);

  const streams: pino.StreamEntry[] = [{ level: 'info', stream: jobLogStream }];
  if (consoleLevel !== 'silent') {
    streams.push({ level: consoleLevel, stream: process.stdout });
  }

  const level = LEVEL_ORDER.indexOf(consoleLevel) < LEVEL_ORDER.indexOf('info') ? consoleLevel : 'info';

  return pino(
    {
      name: serviceName,
      level,
      base: { pid: process.pid, ...bindings },
      formatters: {
        level: (label) => {
          return { level: label };
        }
      },
      serializers: {
        error: pino.stdSerializers.err
      },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.multistream(streams)
  );
}

export type Logger = ReturnType<typeof createLogger>;
