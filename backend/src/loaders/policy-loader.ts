import { readFile } from "fs/promises";
import { TextSplitter } from "@langchain/textsplitters";
import { EmbeddingService } from "../embeddings/index.js";
import { logger } from "../logger.js";
import { PolicyChunk } from "../models/policy.js";

export interface PolicySection {
  chunkId: string;
  text: string;
}

export async function loadPolicyDocument(filePath: string): Promise<string> {
  const content = await readFile(filePath, "utf-8");
  logger.debug({ filePath, length: content.length }, "Policy document loaded");
  return content;
}

/**
 * Splits a markdown policy on its `### ` headings, then breaks sections
 * longer than the splitter's chunk size into smaller pieces. Chunk ids are
 * positional, so re-seeding the same document yields the same ids.
 */
export async function splitPolicyDocument(
  markdown: string,
  splitter: TextSplitter,
): Promise<PolicySection[]> {
  const sections = markdown
    .split(/^### /m)
    .map((section) => section.trim())
    .filter((section) => section.length > 0);

  const pieces: string[] = [];
  for (const section of sections) {
    pieces.push(...(await splitter.splitText(section)));
  }

  return pieces.map((text, index) => ({
    chunkId: `policy-${String(index + 1).padStart(3, "0")}`,
    text,
  }));
}

export async function embedPolicySections(
  sections: PolicySection[],
  embeddings: EmbeddingService,
  batchSize: number = 16,
): Promise<PolicyChunk[]> {
  const chunks: PolicyChunk[] = [];

  for (let start = 0; start < sections.length; start += batchSize) {
    const batch = sections.slice(start, start + batchSize);
    const vectors = await embeddings.embed(batch.map((section) => section.text));
    if (vectors.length !== batch.length) {
      throw new Error(`Expected ${batch.length} embeddings, received ${vectors.length}`);
    }
    batch.forEach((section, index) => chunks.push({ ...section, embedding: vectors[index] }));
    logger.debug({ embedded: chunks.length, total: sections.length }, "Policy batch embedded");
  }

  return chunks;
}
