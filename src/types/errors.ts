// Typed error values carried in neverthrow Results

export type DockerError =
  | { kind: 'unreachable'; message: string }
  | { kind: 'http'; message: string; status: number }
  | { kind: 'aborted'; message: string }
  | { kind: 'decode'; message: string };

export type GroupStoreError =
  | { kind: 'not_found'; message: string; id: string }
  | { kind: 'invalid'; message: string }
  | { kind: 'io'; message: string };

export type ConfigError = { kind: 'config'; message: string; path: string };

export type BatchFailure = { id: string; cause: string; label?: string };

export type BatchError = {
  kind: 'batch';
  message: string;
  failures: BatchFailure[];
  succeeded: string[];
};

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
