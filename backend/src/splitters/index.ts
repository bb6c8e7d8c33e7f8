import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";
import { logger } from "../logger.js";

export interface SplitterOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export function createTextSplitter({ chunkSize, chunkOverlap }: SplitterOptions): RecursiveCharacterTextSplitter {
  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize,
    chunkOverlap,
    separators: ["\n\n", "\n", ". ", "! ", "? ", " "],
  });

  logger.debug({ chunkSize, chunkOverlap }, "Text splitter created");

  return splitter;
}
