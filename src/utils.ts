import fs from 'fs-extra';

/**
 * Message of a thrown value, whatever was thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * HTTP status carried by an Octokit RequestError, if any
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

function parseJsonSafe(str: string | undefined | null): unknown {
  try {
    return str ? JSON.parse(str) : {};
  } catch {
    return {};
  }
}

/**
 * Read the webhook payload GitHub writes to GITHUB_EVENT_PATH
 */
export async function readEventPayload(eventPath: string | undefined): Promise<unknown> {
  if (!eventPath || !(await fs.pathExists(eventPath))) {
    return {};
  }
  return parseJsonSafe(await fs.readFile(eventPath, 'utf-8'));
}
