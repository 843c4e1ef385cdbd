import { randomUUID } from 'crypto';
import type { FastifyPluginAsync } from 'fastify';
import type { ServiceContainer } from '../../index.js';
import { resolveMimeType } from '../../lib/document-extractor.js';
import { ValidationError, errorMessage } from '../../lib/errors.js';
import { padOrdinal, type SourceDocument } from '../../modules/documents.js';
import { parseFieldSpec } from '../../modules/info-extract.js';
import { requireUser } from '../plugins/auth.js';

interface Upload {
  fileName: string;
  buffer: Buffer;
}

// Form fields holding JSON rather than a plain string.
const JSON_FIELDS = new Set(['fields']);
// File fields that configure the job instead of being processed.
const FIELD_SPEC_FILE = 'fieldSpec';

function parseFormValue(name: string, value: string): unknown {
  if (!JSON_FIELDS.has(name)) return value;
  try {
    return JSON.parse(value);
  } catch {
    throw new ValidationError(`Form field '${name}' must be valid JSON`);
  }
}

export const moduleRoutes: FastifyPluginAsync<{ container: ServiceContainer }> = async (app, opts) => {
  const { registry, storage, extractor, jobs } = opts.container;

  // GET /api/modules
  app.get('/', async () => ({
    data: registry.list().map(module => ({
      key: module.key,
      label: module.label,
      unitLabel: module.unitLabel,
    })),
  }));

  // POST /api/modules/:module/jobs (multipart: one or more files, plus module options)
  app.post<{ Params: { module: string } }>('/:module/jobs', async (request, reply) => {
    const user = requireUser(request);
    const module = registry.require(request.params.module);

    const uploads: Upload[] = [];
    const options: Record<string, unknown> = {};

    for await (const part of request.parts()) {
      if (part.type === 'file') {
        const buffer = await part.toBuffer();
        if (part.fieldname === FIELD_SPEC_FILE) {
          options.fields = await parseFieldSpec(buffer);
        } else {
          resolveMimeType(part.filename);
          uploads.push({ fileName: part.filename, buffer });
        }
      } else if (typeof part.value === 'string' && part.value.trim() !== '') {
        options[part.fieldname] = parseFormValue(part.fieldname, part.value);
      }
    }

    if (uploads.length === 0) throw new ValidationError('No file uploaded');

    const jobId = randomUUID();
    try {
      const documents: SourceDocument[] = [];
      for (const [i, upload] of uploads.entries()) {
        const extracted = await extractor.extract(upload.buffer, upload.fileName);
        const sourcePath = await storage.writeBuffer(
          module.key,
          jobId,
          `source_${padOrdinal(i + 1)}${extracted.extension}`,
          upload.buffer,
        );
        documents.push({ fileName: upload.fileName, mimeType: extracted.mimeType, sourcePath, text: extracted.text });
      }

      const submitted = await jobs.submit({
        userId: user.id,
        moduleKey: module.key,
        payload: { ...options, documents },
        jobId,
      });
      return reply.status(202).send({ data: { ...submitted, statusUrl: `/api/jobs/${jobId}` } });
    } catch (error) {
      // Nothing was admitted, so the stored uploads belong to no job.
      await storage.removeJobDirectory(module.key, jobId).catch((cleanupError: unknown) => {
        request.log.warn({ jobId, error: errorMessage(cleanupError) }, 'Failed to remove rejected uploads');
      });
      throw error;
    }
  });
};
