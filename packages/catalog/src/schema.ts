import { z } from "zod";
import { VERSION_PLACEHOLDER } from "./types.js";

// ---------------------------------------------------------------------------
// Schema — one entry of the addon list. The loader parses YAML with the
// failsafe schema, so every scalar arrives as a string.
// ---------------------------------------------------------------------------

const token = z
  .string()
  .trim()
  .min(1, "must not be empty")
  .regex(/^\S+$/, "must not contain whitespace");

export const AddonEntrySchema = z
  .object({
    id: token,
    repository: token.regex(
      /^[^/]+\/[^/]+$/,
      'must look like "owner/name"',
    ),
    tagPrefix: token,
    filename: token.refine((f) => f.includes(VERSION_PLACEHOLDER), {
      message: `must contain the ${VERSION_PLACEHOLDER} placeholder`,
    }),
    version: token.refine((v) => !v.includes("/"), {
      message: 'must not contain "/"',
    }),
    variable: z
      .string()
      .trim()
      .regex(
        /^[A-Za-z_][A-Za-z0-9_]*$/,
        "must be a valid build variable name",
      )
      .optional(),
    channel: token.optional(),
  })
  .strict();

export type AddonEntry = z.infer<typeof AddonEntrySchema>;

export const CatalogDocumentSchema = z.union([
  z.object({ addons: z.array(z.unknown()) }).strict(),
  z.array(z.unknown()),
]);
