import { BaseOutputParser } from "@langchain/core/output_parsers";
import { AssemblyFormatError, toErrorMessage } from "../errors.js";
import { ResilientCaller } from "../resilience/resilient-call.js";

export interface Completion {
  text: string;
  tokensUsed?: number;
}

export interface CompleteOptions {
  signal?: AbortSignal;
}

/** Opaque "complete text" backend. */
export interface GenerativeService {
  complete(prompt: string, options?: CompleteOptions): Promise<Completion>;
}

export interface StructuredCallOptions {
  label: string;
  timeoutMs: number;
}

export async function completeText(
  caller: ResilientCaller,
  llm: GenerativeService,
  prompt: string,
  options: StructuredCallOptions,
): Promise<string> {
  const completion = await caller.call(
    "llm",
    ({ signal }) => llm.complete(prompt, { signal }),
    { ...options, tokensUsed: (result) => result.tokensUsed },
  );
  return completion.text;
}

/**
 * Completes `prompt` and parses the reply with `parser`. A reply that does
 * not satisfy the parser's schema surfaces as AssemblyFormatError; transport
 * failures keep their own error types.
 */
export async function completeStructured<T>(
  caller: ResilientCaller,
  llm: GenerativeService,
  prompt: string,
  parser: BaseOutputParser<T>,
  options: StructuredCallOptions,
): Promise<T> {
  const text = await completeText(caller, llm, prompt, options);
  try {
    return await parser.parse(text);
  } catch (error) {
    throw new AssemblyFormatError(
      `${options.label} returned output that does not match the schema: ${toErrorMessage(error)}`,
      { cause: error },
    );
  }
}
