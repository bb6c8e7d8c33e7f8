export const POLICY_EXPERT = "policy_expert";
export const TRANSACTION_AGENT = "transaction_agent";

export type HandlerId = string;
export type TaskName = string;
export type TaskContext = Readonly<Record<string, unknown>>;

export interface TaskRequest {
  readonly target: HandlerId;
  readonly task: TaskName;
  readonly context: TaskContext;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export type TaskState = "succeeded" | "failed";

export interface ResponseMetadata {
  timestamp: string;
  latencyMs: number;
  task: TaskName;
  state: TaskState;
  [key: string]: unknown;
}

export type TaskResult = Record<string, unknown>;

export type TaskResponse =
  | {
      readonly source: HandlerId;
      readonly status: "success";
      readonly result: TaskResult;
      readonly error?: undefined;
      readonly metadata: Readonly<ResponseMetadata>;
    }
  | {
      readonly source: HandlerId;
      readonly status: "error";
      readonly result?: undefined;
      readonly error: string;
      readonly metadata: Readonly<ResponseMetadata>;
    };

export function createTaskRequest(
  target: HandlerId,
  task: TaskName,
  context: Record<string, unknown> = {},
  metadata: Record<string, unknown> = {},
): TaskRequest {
  return Object.freeze({
    target,
    task,
    context: Object.freeze({ ...context }),
    metadata: Object.freeze({ ...metadata }),
  });
}

export function successResponse(
  source: HandlerId,
  result: TaskResult,
  metadata: ResponseMetadata,
): TaskResponse {
  const response: TaskResponse = {
    source,
    status: "success",
    result,
    metadata: Object.freeze(metadata),
  };
  return Object.freeze(response);
}

export function errorResponse(
  source: HandlerId,
  error: string,
  metadata: ResponseMetadata,
): TaskResponse {
  const response: TaskResponse = {
    source,
    status: "error",
    error,
    metadata: Object.freeze(metadata),
  };
  return Object.freeze(response);
}
