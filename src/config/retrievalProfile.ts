import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";

const keywordList = z.array(z.string().min(1)).default([]);

const intentSchema = z.object({
  queryKeywords: keywordList,
  contentSignals: keywordList,
});

const profileSchema = z.object({
  stopwords: keywordList,
  interrogativeCues: keywordList,
  entityKeywords: keywordList,
  intents: z.object({
    name: intentSchema,
    contact: intentSchema,
    policy: intentSchema,
    benefit: intentSchema,
    process: intentSchema,
  }),
  processIndicators: keywordList,
  recoveryKeywords: keywordList,
  knowledgePatterns: z
    .array(z.string())
    .default([])
    .superRefine((patterns, ctx) => {
      patterns.forEach((pattern, index) => {
        try {
          new RegExp(pattern, "i");
        } catch (error) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index],
            message: `Invalid pattern ${pattern}: ${error instanceof Error ? error.message : String(error)}`,
          });
        }
      });
    }),
  questionIndicators: keywordList,
});

export type RetrievalProfile = z.infer<typeof profileSchema>;
export type IntentName = keyof RetrievalProfile["intents"];

export function parseRetrievalProfile(raw: unknown): RetrievalProfile {
  return profileSchema.parse(raw);
}

export async function loadRetrievalProfile(filePath: string): Promise<RetrievalProfile> {
  const absolutePath = path.resolve(filePath);
  const raw = await fs.readFile(absolutePath, "utf-8");
  return parseRetrievalProfile(JSON.parse(raw));
}

export function emptyRetrievalProfile(): RetrievalProfile {
  const emptyIntent = { queryKeywords: [], contentSignals: [] };
  return {
    stopwords: [],
    interrogativeCues: [],
    entityKeywords: [],
    intents: {
      name: emptyIntent,
      contact: emptyIntent,
      policy: emptyIntent,
      benefit: emptyIntent,
      process: emptyIntent,
    },
    processIndicators: [],
    recoveryKeywords: [],
    knowledgePatterns: [],
    questionIndicators: [],
  };
}
