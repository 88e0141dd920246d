/**
 * Chunk Stream
 * Cancellable async sequence of decoded SSE chunks
 *
 * A background reader pulls the response body, decodes complete lines and
 * pushes chunks into an AsyncChannel; the consumer iterates with `for await`.
 * cancel() (or breaking out of the loop) stops the reader, aborts the request
 * and drops anything not yet consumed, without raising an error.
 */

import type { ReadableStream, ReadableStreamDefaultReader } from "node:stream/web";
import { ApiError, createLogger } from "@attested-chat/shared";

import { AsyncChannel } from "./channel.js";
import {
  SseLineBuffer,
  classifySseLine,
  decodeDataPayload,
} from "./sse-decoder.js";
import type { ChunkDecoder } from "./sse-decoder.js";

const logger = createLogger("client:stream");

export interface ChunkStreamOptions<T> {
  body: ReadableStream<Uint8Array>;
  decode: ChunkDecoder<T>;
  /** Abort the underlying request; called once on cancel. */
  abort?: () => void;
}

export class ChunkStream<T> implements AsyncIterable<T> {
  private readonly channel = new AsyncChannel<T>();
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private readonly decode: ChunkDecoder<T>;
  private readonly abort: () => void;
  private readonly pumping: Promise<void>;
  private cancelled = false;
  private discarded = 0;

  constructor(options: ChunkStreamOptions<T>) {
    this.reader = options.body.getReader();
    this.decode = options.decode;
    this.abort = options.abort ?? (() => undefined);
    this.pumping = this.pump();
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Resolves once the background reader has stopped.
   */
  finished(): Promise<void> {
    return this.pumping;
  }

  cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.channel.close(true);
    this.abort();
    void this.releaseReader();
    logger.debug("Stream cancelled by consumer");
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.channel.next(),
      return: async () => {
        this.cancel();
        return { value: undefined, done: true };
      },
    };
  }

  private async pump(): Promise<void> {
    const lines = new SseLineBuffer();
    let sawDone = false;

    try {
      while (!this.cancelled && !sawDone) {
        const result = await this.reader.read();
        if (result.done || this.cancelled) {
          break;
        }
        sawDone = this.handleLines(lines.push(result.value));
      }
      if (!this.cancelled && !sawDone) {
        sawDone = this.handleLines(lines.flush());
      }
      this.channel.close();
    } catch (error) {
      if (this.cancelled) {
        this.channel.close(true);
      } else {
        logger.warn("Stream read failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        this.channel.fail(new ApiError("STREAM_INTERRUPTED", undefined, { cause: error }));
      }
    }

    if (sawDone && !this.cancelled) {
      await this.releaseReader();
    }
    if (this.discarded > 0) {
      logger.debug("Discarded undecodable stream records", { count: this.discarded });
    }
  }

  /**
   * Returns true once the [DONE] sentinel is seen; later lines are ignored.
   */
  private handleLines(rawLines: string[]): boolean {
    for (const raw of rawLines) {
      if (this.cancelled) {
        return false;
      }
      const line = classifySseLine(raw);
      if (line.type === "done") {
        return true;
      }
      if (line.type === "data") {
        const chunk = decodeDataPayload(line.payload, this.decode);
        if (chunk === undefined) {
          this.discarded += 1;
        } else {
          this.channel.push(chunk);
        }
      }
    }
    return false;
  }

  private async releaseReader(): Promise<void> {
    try {
      await this.reader.cancel();
    } catch (error) {
      logger.debug("Body reader already released", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
