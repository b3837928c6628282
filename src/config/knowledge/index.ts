// src/config/knowledge/index.ts
import { z } from "zod";
import rawRules from "./retrievalRules.json";
import rawFactSheet from "./factSheet.json";
import rawStopWords from "./stopWords.json";
import rawPhrases from "./conversationPhrases.json";

const phraseSchema = z.string().trim().min(1).transform((value) => value.toLowerCase());

const retrievalRulesSchema = z.object({
    corrections: z.array(z.object({ heard: phraseSchema, meant: phraseSchema })),
    synonymHints: z.array(
        z.object({
            whenAny: z.array(phraseSchema).min(1),
            alsoAny: z.array(phraseSchema).optional(),
            append: z.string().trim().min(1),
        })
    ),
    forcedRules: z.array(
        z.object({
            keywords: z.array(phraseSchema).min(1),
            documents: z.array(z.string().trim().min(1)).min(1),
        })
    ),
    baselineDocuments: z.array(z.string().trim().min(1)).min(1),
});

const factSheetSchema = z.object({
    institution: z.string().trim().min(1),
    facts: z.array(z.string().trim().min(1)),
});

const phraseListSchema = z.array(phraseSchema).min(1);

const conversationPhrasesSchema = z.object({
    thanks: phraseListSchema,
    compliments: phraseListSchema,
    filler: z.array(phraseSchema),
    farewells: phraseListSchema,
    referentialWords: phraseListSchema,
    escalationPhrases: phraseListSchema,
});

export type RetrievalRules = z.infer<typeof retrievalRulesSchema>;
export type MisheardCorrection = RetrievalRules["corrections"][number];
export type FactSheet = z.infer<typeof factSheetSchema>;
export type ConversationPhrases = z.infer<typeof conversationPhrasesSchema>;

const parseOrThrow = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, file: string): T => {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new Error(`❌ Invalid knowledge file ${file}: ${issues.join("; ")}`);
    }
    return result.data;
};

export const retrievalRules: RetrievalRules = parseOrThrow(retrievalRulesSchema, rawRules, "retrievalRules.json");
export const factSheet: FactSheet = parseOrThrow(factSheetSchema, rawFactSheet, "factSheet.json");
export const conversationPhrases: ConversationPhrases = parseOrThrow(
    conversationPhrasesSchema,
    rawPhrases,
    "conversationPhrases.json"
);
export const stopWords: ReadonlySet<string> = new Set(
    parseOrThrow(z.array(phraseSchema), rawStopWords, "stopWords.json")
);
