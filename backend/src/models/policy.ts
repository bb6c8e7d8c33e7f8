import { z } from "zod";

export const PolicyChunkSchema = z.object({
  chunkId: z.string().min(1),
  text: z.string().min(1),
  embedding: z.array(z.number()).min(1),
});

export type PolicyChunk = z.infer<typeof PolicyChunkSchema>;

export interface RankedChunk {
  chunkId: string;
  text: string;
  similarity: number;
}
