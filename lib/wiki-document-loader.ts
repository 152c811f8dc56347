import * as fs from "fs";
import { z } from "zod";
import { MalformedInputError, MissingInputError } from "./wiki-errors";

/**
 * One wiki document produced by the enumeration step.
 * `content` is attached by this tool: text when retrieved, null when not.
 * Fields not listed here are carried through untouched.
 */
export const documentDescriptorSchema = z
  .object({
    number: z.number().int(),
    title: z.string(),
    // the enumeration script writes level as a string ("1")
    level: z.union([z.number().int(), z.string()]),
    node_token: z.string(),
    document_token: z.string(),
    url: z.string(),
    parent: z.string().optional(),
    path: z.string().optional(),
  })
  .passthrough();

export type DocumentDescriptor = z.infer<typeof documentDescriptorSchema> & {
  content?: string | null;
};

const descriptorListSchema = z.array(documentDescriptorSchema);

/**
 * Read descriptors from a JSON array file, preserving file order.
 *
 * @throws MissingInputError when the file does not exist
 * @throws MalformedInputError when the file is not a JSON array of descriptors
 */
export function loadDocumentDescriptors(inputFile: string): DocumentDescriptor[] {
  if (!fs.existsSync(inputFile)) {
    throw new MissingInputError(inputFile);
  }

  const raw = fs.readFileSync(inputFile, "utf-8");

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new MalformedInputError(inputFile, "not valid JSON", { cause: error });
  }

  const parsed = descriptorListSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `[${issue.path.join(".")}] ` : "";
    throw new MalformedInputError(inputFile, `${where}${issue.message}`);
  }

  // Content in the input is stale; this tool sets it
  return parsed.data.map((doc) => ({ ...doc, content: undefined }));
}
