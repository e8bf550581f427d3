/**
 * Remote worker handle
 * Talks to a forked process or a worker thread over zod-validated messages
 */

import { describeError } from "../render/classify";
import { WorkerMessageSchema, type ParentMessage } from "./protocol";
import type { Logger } from "../utils/logger";
import type { WorkerHandle } from "./worker-handle";
import type { DocumentOutcome, SourceDocument } from "../types";

const SHUTDOWN_GRACE_MS = 10_000;

/**
 * Minimal channel to the other side; implemented for child processes and
 * worker threads
 */
export interface WorkerTransport {
  send(message: ParentMessage): void;
  onMessage(listener: (message: unknown) => void): void;
  onExit(listener: (reason: string) => void): void;
  terminate(): void;
}

interface PendingConversion {
  resolve: (outcome: DocumentOutcome) => void;
  reject: (error: Error) => void;
}

export class RemoteWorker implements WorkerHandle {
  private readonly pending = new Map<number, PendingConversion>();
  private readonly exited: Promise<void>;
  private exitReason: string | null = null;
  private nextId = 1;

  constructor(
    private readonly transport: WorkerTransport,
    private readonly logger: Logger,
  ) {
    transport.onMessage((message) => this.handleMessage(message));
    this.exited = new Promise((resolve) => {
      transport.onExit((reason) => {
        this.handleExit(reason);
        resolve();
      });
    });
  }

  convert(document: SourceDocument): Promise<DocumentOutcome> {
    if (this.exitReason !== null) {
      return Promise.reject(new Error(`Worker is gone: ${this.exitReason}`));
    }

    const id = this.nextId++;
    return new Promise((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      try {
        this.transport.send({ type: "convert", id, document });
      } catch (error) {
        this.pending.delete(id);
        reject(new Error(`Failed to reach worker: ${describeError(error)}`));
      }
    });
  }

  async close(): Promise<void> {
    if (this.exitReason !== null) return;

    try {
      this.transport.send({ type: "shutdown" });
    } catch (error) {
      this.logger.debug(`Shutdown message not delivered: ${describeError(error)}`);
      this.transport.terminate();
    }

    const timer = setTimeout(() => this.transport.terminate(), SHUTDOWN_GRACE_MS);
    try {
      await this.exited;
    } finally {
      clearTimeout(timer);
    }
  }

  private handleMessage(message: unknown): void {
    const parsed = WorkerMessageSchema.safeParse(message);
    if (!parsed.success) {
      this.logger.warn(`Ignoring malformed worker message: ${parsed.error.message}`);
      return;
    }

    const { id, outcome } = parsed.data;
    const entry = this.pending.get(id);
    if (!entry) {
      this.logger.debug(`No pending conversion for message ${id}`);
      return;
    }
    this.pending.delete(id);
    entry.resolve(outcome);
  }

  private handleExit(reason: string): void {
    this.exitReason = reason;
    const error = new Error(`Worker exited: ${reason}`);
    for (const entry of this.pending.values()) {
      entry.reject(error);
    }
    this.pending.clear();
  }
}
