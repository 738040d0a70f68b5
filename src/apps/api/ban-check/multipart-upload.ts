import type { FastifyRequest } from 'fastify';

export const CSV_FILE_FIELD = 'file';
export const PROXY_FILE_FIELD = 'proxyFile';

/** Registered with @fastify/multipart: a CSV and a proxy file at most. */
export const MULTIPART_LIMITS = {
  fileSize: 10 * 1024 * 1024,
  files: 2,
};

export interface MultipartUpload {
  /** Text of each known file part, keyed by field name. */
  files: Map<string, string>;
  /** Every value sent for each text field, in arrival order. */
  fields: Record<string, string[]>;
}

const FILE_FIELDS = new Set([CSV_FILE_FIELD, PROXY_FILE_FIELD]);

export async function readMultipartUpload(req: FastifyRequest): Promise<MultipartUpload> {
  const upload: MultipartUpload = { files: new Map(), fields: {} };

  for await (const part of req.parts()) {
    if (part.type === 'file') {
      // Every file part has to be drained for the iterator to advance
      const buffer = await part.toBuffer();
      if (FILE_FIELDS.has(part.fieldname)) {
        upload.files.set(part.fieldname, buffer.toString('utf8'));
      }
      continue;
    }
    (upload.fields[part.fieldname] ??= []).push(String(part.value));
  }

  return upload;
}

/**
 * Shapes text fields for validation: the fields named in `listFields` keep
 * every value, the rest keep the last one sent.
 */
export function formBody(
  fields: Record<string, string[]>,
  listFields: readonly string[] = [],
): Record<string, string | string[]> {
  const body: Record<string, string | string[]> = {};
  for (const [name, values] of Object.entries(fields)) {
    body[name] = listFields.includes(name) ? values : values[values.length - 1];
  }
  return body;
}
