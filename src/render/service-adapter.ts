/**
 * Service-client render adapter
 * Renders through a remote diagram service with bounded retries
 */

import { writeFile } from "fs/promises";
import { isNonEmptyFile } from "../utils/fs";
import { describeError, isTransientError } from "./classify";
import { withRetry, type AttemptOutcome } from "./retry";
import type { Logger } from "../utils/logger";
import type {
  DiagramServiceClient,
  DiagramServiceClientFactory,
} from "./service-client";
import type {
  DiagramDialect,
  ImageFitter,
  RenderAdapter,
  RenderResult,
  ResizePlan,
  Sleep,
} from "../types";

export interface ServiceAdapterOptions {
  dialect: DiagramDialect;
  label: string; // Used in error messages, e.g. "PlantUML"
  createClient: DiagramServiceClientFactory;
  maxAttempts: number;
  baseDelayMs: number;
  sleep: Sleep;
  fitImage: ImageFitter;
  logger: Logger;
}

export class ServiceRenderAdapter implements RenderAdapter {
  readonly dialect: DiagramDialect;
  private client: DiagramServiceClient;

  constructor(private readonly options: ServiceAdapterOptions) {
    this.dialect = options.dialect;
    this.client = options.createClient();
  }

  async render(
    source: string,
    outputPath: string,
    plan: ResizePlan,
  ): Promise<RenderResult> {
    const { label, logger, maxAttempts } = this.options;

    const result = await withRetry<void>(
      () => this.attempt(source, outputPath),
      {
        maxAttempts,
        baseDelayMs: this.options.baseDelayMs,
        sleep: this.options.sleep,
        onRetry: (attempt, delayMs, error) => {
          logger.warn(
            `${label} request failed (attempt ${attempt}/${maxAttempts}): ${error}. Retrying in ${delayMs / 1000}s...`,
          );
          // Discard any broken connection state
          this.client = this.options.createClient();
        },
      },
    );

    if (!result.ok) {
      return { ok: false, error: result.error, attempts: result.attempts };
    }

    if (result.attempts > 1) {
      logger.debug(`${label} diagram rendered on attempt ${result.attempts}`);
    }

    if (plan.kind !== "none") {
      await this.options.fitImage(outputPath, plan);
    }

    return { ok: true, attempts: result.attempts };
  }

  private async attempt(
    source: string,
    outputPath: string,
  ): Promise<AttemptOutcome<void>> {
    const { label } = this.options;

    try {
      const data = await this.client.render(source);
      await writeFile(outputPath, data);
    } catch (error) {
      const message = `Failed to render ${label} diagram: ${describeError(error)}`;
      return isTransientError(message)
        ? { kind: "retryable", error: message }
        : { kind: "fatal", error: message };
    }

    if (!(await isNonEmptyFile(outputPath))) {
      return {
        kind: "fatal",
        error: `${label} diagram file was not created or is empty`,
      };
    }

    return { kind: "success", value: undefined };
  }
}
