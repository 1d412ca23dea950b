/**
 * HTTP client for the tree-producing parse service.
 *
 * Protocol: `POST <endpoint>/parse` with `{ filename, language, content }`,
 * answered by `{ status, errors, uast }`. Network failures, 429 and 5xx
 * responses are retried with exponential backoff; anything else fails the
 * file immediately.
 */
import * as path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import { normalizeTree, type SyntaxNode } from '../tree/index.js';
import {
  ErrorCodes,
  TreeAcquisitionError,
  errorMessage,
  logger,
  readFile,
} from '../../utils/index.js';
import type { TreeSource } from './types.js';

const log = logger.child('parser');

export interface ParseServiceOptions {
  /** Base URL, e.g. `http://localhost:9432` */
  endpoint: string;
  timeoutMs?: number;
  /** Extra attempts after a transient failure */
  retries?: number;
  retryDelayMs?: number;
  language?: string;
}

const ParseResponseSchema = z.object({
  status: z.enum(['ok', 'error', 'fatal']),
  errors: z.array(z.string()).nullish(),
  uast: z.unknown().optional(),
});

/** Failure worth another attempt. */
class TransientFailure extends Error {}

export class ParseServiceClient implements TreeSource {
  readonly name = 'parse-service';

  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly language: string;

  constructor(options: ParseServiceOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.language = options.language ?? 'java';
  }

  async parse(filePath: string): Promise<SyntaxNode> {
    let content: string;
    try {
      content = await readFile(filePath);
    } catch (error) {
      throw new TreeAcquisitionError(
        ErrorCodes.PARSE_FAILED,
        `Cannot read ${filePath}: ${errorMessage(error)}`,
        { filePath }
      );
    }

    let lastError: unknown;
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      try {
        const uast = await this.request(filePath, content);
        return this.toTree(uast, filePath);
      } catch (error) {
        if (!(error instanceof TransientFailure)) throw error;
        lastError = error;
        if (attempt === this.retries) break;

        const waitMs = this.retryDelayMs * 2 ** attempt;
        log.debug(`Retrying ${filePath} in ${waitMs}ms (${error.message})`);
        await delay(waitMs);
      }
    }

    throw new TreeAcquisitionError(
      ErrorCodes.SERVICE_UNAVAILABLE,
      `Parse service failed for ${filePath} after ${this.retries + 1} attempts: ${errorMessage(lastError)}`,
      { filePath, endpoint: this.endpoint }
    );
  }

  /**
   * One attempt. The timeout covers the whole exchange, body included.
   */
  private async request(filePath: string, content: string): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.exchange(filePath, content, controller.signal);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async exchange(filePath: string, content: string, signal: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.endpoint}/parse`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          filename: path.basename(filePath),
          language: this.language,
          content,
        }),
        signal,
      });
    } catch (error) {
      throw new TransientFailure(errorMessage(error));
    }

    if (response.status === 429 || response.status >= 500) {
      throw new TransientFailure(`HTTP ${response.status}`);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (signal.aborted) {
        throw new TransientFailure(`Timed out after ${this.timeoutMs}ms reading the response`);
      }
      throw new TransientFailure(errorMessage(error));
    }

    if (!response.ok) {
      const sanitizedError = text.length > 200
        ? text.substring(0, 200) + '...'
        : text;
      throw new TreeAcquisitionError(
        ErrorCodes.PARSE_REJECTED,
        `Parse service rejected ${filePath}: ${response.status} - ${sanitizedError}`,
        { filePath, status: response.status }
      );
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new TreeAcquisitionError(
        ErrorCodes.PARSE_FAILED,
        `Parse service returned invalid JSON for ${filePath}: ${errorMessage(error)}`,
        { filePath }
      );
    }
  }

  private toTree(body: unknown, filePath: string): SyntaxNode {
    const parsed = ParseResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TreeAcquisitionError(
        ErrorCodes.PARSE_FAILED,
        `Unexpected parse service response for ${filePath}`,
        { filePath, issues: parsed.error.issues }
      );
    }

    const { status, errors, uast } = parsed.data;
    if (status !== 'ok' || uast === undefined || uast === null) {
      const reasons = errors && errors.length > 0 ? errors.join('; ') : 'no tree returned';
      throw new TreeAcquisitionError(
        ErrorCodes.PARSE_REJECTED,
        `Parser could not process ${filePath} (${status}): ${reasons}`,
        { filePath, status, errors: errors ?? [] }
      );
    }

    try {
      return normalizeTree(uast, filePath);
    } catch (error) {
      throw new TreeAcquisitionError(
        ErrorCodes.PARSE_FAILED,
        errorMessage(error),
        { filePath }
      );
    }
  }
}
