import { z } from "zod";
import { ValidationError, toErrorMessage } from "../errors.js";
import { Logger, componentLogger } from "../logger.js";
import { SpanParent, traceSafely, openSpan } from "../utils/tracing.js";
import {
  HandlerId,
  ResponseMetadata,
  TaskName,
  TaskRequest,
  TaskResponse,
  TaskResult,
  errorResponse,
  successResponse,
} from "./protocol.js";

export interface ExecutionScope {
  /** Span of this invocation, for nesting further spans. */
  span?: SpanParent;
  log: Logger;
}

/** Task-specific logic plugged into a TaskHandler. */
export interface TaskExecutor {
  readonly tasks: readonly TaskName[];
  execute(request: TaskRequest, scope: ExecutionScope): Promise<TaskResult>;
}

/** Validates a request's loosely-typed context into a typed structure. */
export function parseContext<T extends z.ZodTypeAny>(
  schema: T,
  request: TaskRequest,
): z.infer<T> {
  const parsed = schema.safeParse(request.context);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "context"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid context for ${request.task}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Uniform lifecycle around a TaskExecutor: one span per invocation, latency
 * measurement and translation of every failure into an error response.
 * `handle` never rejects.
 */
export class TaskHandler {
  private readonly log: Logger;

  constructor(
    readonly name: HandlerId,
    private readonly executor: TaskExecutor,
  ) {
    this.log = componentLogger(name);
  }

  get tasks(): readonly TaskName[] {
    return this.executor.tasks;
  }

  async handle(request: TaskRequest, parent?: SpanParent): Promise<TaskResponse> {
    const startTime = Date.now();
    const span = openSpan(parent, {
      name: `${this.name}:${request.task}`,
      input: request.context,
      metadata: { handler: this.name, task: request.task },
    });

    const metadata = (state: ResponseMetadata["state"]): ResponseMetadata => ({
      timestamp: new Date().toISOString(),
      latencyMs: Date.now() - startTime,
      task: request.task,
      state,
    });

    try {
      if (request.target !== this.name) {
        throw new ValidationError(
          `Request addressed to '${request.target}' was delivered to '${this.name}'`,
        );
      }
      if (!this.executor.tasks.includes(request.task)) {
        throw new ValidationError(`Unknown task '${request.task}'`);
      }

      this.log.debug({ task: request.task }, "Executing task");
      const result = await this.executor.execute(request, { span, log: this.log });
      const response = successResponse(this.name, result, metadata("succeeded"));

      traceSafely(() => span?.end({ output: result, metadata: response.metadata }));
      this.log.info(
        { task: request.task, latencyMs: response.metadata.latencyMs },
        "Task succeeded",
      );
      return response;
    } catch (error) {
      const response = errorResponse(
        this.name,
        `Task failed in ${this.name}: ${toErrorMessage(error)}`,
        metadata("failed"),
      );

      traceSafely(() => {
        span?.update({ level: "ERROR", statusMessage: response.error });
        span?.end({ metadata: response.metadata });
      });
      this.log.error(
        { task: request.task, latencyMs: response.metadata.latencyMs, error: toErrorMessage(error) },
        "Task failed",
      );
      return response;
    }
  }
}
