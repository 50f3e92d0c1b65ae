import { z } from "zod";
import { PROTOCOL_IDS } from "./Protocol";

/**
 * Shape of a protocol definition file (protocols/<id>.json)
 */
export const protocolDefinitionSchema = z
  .object({
    id: z.enum(PROTOCOL_IDS),
    version: z.string().min(1),
    displayName: z.string().min(1),
    summary: z.string().min(1),
    requiredSections: z.array(z.string().trim().min(1)).min(1),
    wordRange: z.object({
      min: z.number().int().positive(),
      max: z.number().int().positive(),
    }),
    tone: z.string().min(1),
    maxTokens: z.number().int().positive(),
    readingMinutes: z.string().min(1),
    promptFile: z.string().min(1),
    inputTemplate: z.string().min(1),
    usesCollisionVectors: z.boolean().default(false),
  })
  .refine((def) => def.wordRange.min < def.wordRange.max, {
    message: "wordRange.min must be less than wordRange.max",
    path: ["wordRange"],
  })
  .refine(
    (def) =>
      new Set(def.requiredSections.map((s) => s.toLowerCase())).size ===
      def.requiredSections.length,
    {
      message: "requiredSections must be distinct",
      path: ["requiredSections"],
    },
  );

export type ProtocolDefinition = z.infer<typeof protocolDefinitionSchema>;
