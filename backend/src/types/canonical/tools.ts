/* SPDX-License-Identifier: MIT */
import { z } from "zod";

export const FunctionDefinitionParametersSchema = z.record(
  z.string(),
  z.unknown(),
);

export const ToolSchema = z.object({
  type: z.literal("function"),
  function: z.object({
    name: z.string().min(1),
    description: z.string(),
    parameters: FunctionDefinitionParametersSchema,
  }),
});

export const NamedToolChoiceSchema = z.object({
  type: z.literal("function"),
  function: z.object({
    name: z.string(),
  }),
});

export const ToolChoiceOptionSchema = z.union([
  z.enum(["none", "auto", "required"]),
  NamedToolChoiceSchema,
]);
