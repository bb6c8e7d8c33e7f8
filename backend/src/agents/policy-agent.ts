import { z } from "zod";
import { PolicySearchResult } from "../models/schemas.js";
import { PolicyRetriever } from "../retrievers/index.js";
import { openSpan, traceSafely } from "../utils/tracing.js";
import { POLICY_EXPERT, TaskRequest } from "./protocol.js";
import { ExecutionScope, TaskExecutor, TaskHandler, parseContext } from "./task-handler.js";

export const SEARCH_POLICY = "search_policy";
export const POLICY_SOURCE = "refund_policy";
export const NO_POLICY_TEXT = "No policy information available in the database.";

const SearchPolicyContextSchema = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
});

export class PolicyExecutor implements TaskExecutor {
  readonly tasks = [SEARCH_POLICY] as const;

  constructor(
    private readonly retriever: PolicyRetriever,
    private readonly topK: number,
  ) {}

  async execute(request: TaskRequest, scope: ExecutionScope): Promise<PolicySearchResult> {
    const { query } = parseContext(SearchPolicyContextSchema, request);

    const retrievalSpan = openSpan(scope.span, { name: "retrieve-policy", input: { query } });
    const chunks = await this.retriever.retrieve(query, this.topK);
    traceSafely(() =>
      retrievalSpan?.end({
        output: chunks.map(({ chunkId, similarity }) => ({ chunkId, similarity })),
      }),
    );

    if (chunks.length === 0) {
      scope.log.warn({ query }, "No policy chunks available");
      return { policyText: NO_POLICY_TEXT, query, source: POLICY_SOURCE, chunks: [] };
    }

    return {
      policyText: chunks.map((chunk) => chunk.text).join("\n---\n"),
      query,
      source: POLICY_SOURCE,
      chunks: chunks.map(({ chunkId, similarity }) => ({ chunkId, similarity })),
    };
  }
}

export function createPolicyExpert(retriever: PolicyRetriever, topK: number): TaskHandler {
  return new TaskHandler(POLICY_EXPERT, new PolicyExecutor(retriever, topK));
}
