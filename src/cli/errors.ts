import { PageFetchError, RequestError } from '../core/errors';

type CliErrorEnvelope = {
  event: 'run.failed';
  runbook: string;
  name: string;
  message: string;
  statusCode?: number;
  page?: number;
  stack?: string;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === '1' || debug === 'true';
};

export const buildCliErrorEnvelope = (runbook: string, err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));

  const envelope: CliErrorEnvelope = {
    event: 'run.failed',
    runbook,
    name: error.name || 'Error',
    message: error.message,
  };

  if ((error instanceof RequestError || error instanceof PageFetchError) && error.statusCode != null) {
    envelope.statusCode = error.statusCode;
  }
  if (error instanceof PageFetchError) {
    envelope.page = error.page;
  }
  if (includeStack && typeof error.stack === 'string') {
    envelope.stack = error.stack;
  }

  return envelope;
};
