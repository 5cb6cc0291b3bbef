/**
 * Slack webhook output sink with buffering and retry
 *
 * Sends log messages to a Slack incoming webhook for remote monitoring.
 * Features:
 * - Validates the webhook URL on initialize
 * - Buffers failed messages for retry
 * - Exponential backoff retry (1s, 2s, 4s, 8s...)
 * - Drops oldest messages when buffer full
 * - Slack failures never reach the caller
 */

import { requestWithTimeout } from '@utils/http';
import type { FetchFn, TimerAPI } from '$types';
import type { SinkInitResult, SlackSink, SlackSinkConfig } from '../types';

/** Backoff ceiling between retries */
const MAX_RETRY_DELAY_MS = 60000;

/**
 * Message in the retry buffer
 */
interface BufferedMessage {
  text: string;
  retries: number;
}

/**
 * Create a Slack sink with buffering and retry
 *
 * Failed messages are buffered and retried with exponential backoff.
 * Nothing is sent until initialize() has accepted the webhook URL.
 *
 * @param fetchImpl - fetch implementation used for the webhook POST
 * @param timerApi - Timer API for retry scheduling
 * @param config - Slack sink configuration
 * @returns Slack sink instance
 *
 * @example
 * ```typescript
 * const slackSink = createSlackSink(fetch, nodeTimer, {
 *   webhookUrl: process.env.SLACK_WEBHOOK_URL,
 *   bufferSize: 10,
 *   retryDelayMs: 1000,
 *   maxRetries: 5,
 *   timeoutMs: 5000
 * });
 * const { message } = await slackSink.initialize();
 * ```
 */
export function createSlackSink(
  fetchImpl: FetchFn,
  timerApi: TimerAPI,
  config: SlackSinkConfig
): SlackSink {
  let webhookUrl: string | null = null;
  let initialized = false;
  const buffer: BufferedMessage[] = [];
  let retryTimerActive = false;
  let currentRetryDelay = config.retryDelayMs;

  /**
   * POST one message to the webhook
   * @returns True when Slack accepted it
   */
  async function sendToSlack(message: BufferedMessage): Promise<boolean> {
    if (!webhookUrl) {
      return false;
    }

    try {
      await requestWithTimeout(fetchImpl, webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: message.text })
      }, config.timeoutMs, async () => undefined);
      return true;
    } catch (err) {
      console.warn(`Slack send failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }

  function scheduleRetry(): void {
    timerApi.set(currentRetryDelay, () => {
      void processBuffer();
    });
  }

  /**
   * Process the retry buffer
   * Attempts to send the first message, schedules retry on failure
   */
  async function processBuffer(): Promise<void> {
    const message = buffer[0];
    if (!message) {
      retryTimerActive = false;
      currentRetryDelay = config.retryDelayMs;
      return;
    }

    if (await sendToSlack(message)) {
      buffer.shift();
      currentRetryDelay = config.retryDelayMs;

      if (buffer.length > 0) {
        await processBuffer();
      } else {
        retryTimerActive = false;
      }
      return;
    }

    message.retries++;

    if (message.retries >= config.maxRetries) {
      console.warn(`Slack message dropped after ${config.maxRetries} retries`);
      buffer.shift();
      currentRetryDelay = config.retryDelayMs;
    } else {
      currentRetryDelay = Math.min(currentRetryDelay * 2, MAX_RETRY_DELAY_MS);
    }

    if (buffer.length > 0) {
      scheduleRetry();
    } else {
      retryTimerActive = false;
    }
  }

  function enqueue(message: BufferedMessage): void {
    if (buffer.length >= config.bufferSize) {
      const dropped = buffer.shift();
      console.warn(`Slack buffer full, dropping oldest message: ${dropped ? dropped.text.substring(0, 50) : ''}`);
    }
    buffer.push(message);

    if (!retryTimerActive) {
      retryTimerActive = true;
      scheduleRetry();
    }
  }

  /**
   * Initialize the sink by validating the webhook URL
   */
  async function initialize(): Promise<SinkInitResult> {
    initialized = true;

    let parsed: URL;
    try {
      parsed = new URL(config.webhookUrl);
    } catch {
      return { success: false, message: 'Slack webhook URL is not a valid URL' };
    }

    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
      return { success: false, message: `Slack webhook URL has unsupported protocol ${parsed.protocol}` };
    }

    webhookUrl = parsed.toString();
    return { success: true, message: `Slack webhook configured (${parsed.host})` };
  }

  /**
   * Write formatted message to Slack
   * Messages are sent immediately if possible, or buffered for retry
   * @param formattedMessage - Pre-formatted log message (already filtered by level)
   */
  function write(formattedMessage: string): void {
    if (!webhookUrl) {
      return;
    }

    const message: BufferedMessage = { text: formattedMessage, retries: 0 };

    void sendToSlack(message).then((sent) => {
      if (!sent) {
        enqueue(message);
      }
    });
  }

  function isInitialized(): boolean {
    return initialized;
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  return {
    write,
    initialize,
    isInitialized,
    getBufferSize
  };
}
