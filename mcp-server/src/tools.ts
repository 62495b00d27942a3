import { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ServerConfig } from './config';
import { FillError, FillErrorCode } from './errors';
import { TemplateFiller } from './TemplateFiller';
import { FileDocumentSink, FileTemplateSource, fillToSink } from './TemplateIo';

export const SERVER_NAME = 'docx-template-filler';
export const SERVER_VERSION = '0.1.0';

// ============================================================
// Tool Definitions
// ============================================================

export const tools: Tool[] = [
  {
    name: 'fill_template',
    description:
      'Fill {{PLACEHOLDER}} tokens in a DOCX template with text and base64 images, then write the result. ' +
      'Formatting and untouched parts are preserved; placeholders without a value are left as-is.',
    inputSchema: {
      type: 'object',
      properties: {
        template_path: { type: 'string', description: 'Template .docx path (optional, uses the configured default)' },
        output_path: { type: 'string', description: 'Output .docx path (optional, uses the configured default)' },
        placeholders: {
          type: 'object',
          additionalProperties: { type: 'string' },
          description: 'Placeholder name → replacement text, e.g. {"LOAN_AMOUNT": "$25,650,000"}',
        },
        images: {
          type: 'object',
          additionalProperties: { type: 'string' },
          description: 'Image placeholder name → base64 PNG/JPEG/GIF/BMP (see get_image_sizes for names)',
        },
      },
    },
  },
  {
    name: 'list_placeholders',
    description: 'List the placeholders a DOCX template contains, with their kind and where they occur',
    inputSchema: {
      type: 'object',
      properties: {
        template_path: { type: 'string', description: 'Template .docx path (optional, uses the configured default)' },
      },
    },
  },
  {
    name: 'get_image_sizes',
    description: 'Get the supported image placeholders and their target widths in inches',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'health',
    description: 'Report server status',
    inputSchema: { type: 'object', properties: {} },
  },
];

const FillTemplateArgsSchema = z.object({
  template_path: z.string().min(1).optional(),
  output_path: z.string().min(1).optional(),
  placeholders: z.record(z.string()).default({}),
  images: z.record(z.string()).default({}),
});

const ListPlaceholdersArgsSchema = z.object({
  template_path: z.string().min(1).optional(),
});

// ============================================================
// Tool Handlers
// ============================================================

export type ToolResponse = { content: Array<{ type: 'text'; text: string }> };
export type ToolHandler = (name: string, args: unknown) => Promise<ToolResponse>;

export function createToolHandler(
  config: Readonly<ServerConfig>,
  filler: TemplateFiller = new TemplateFiller()
): ToolHandler {
  const templateSource = (templatePath: string | undefined): FileTemplateSource => {
    const chosen = templatePath ?? config.defaultTemplate;
    if (!chosen) {
      throw new FillError('template_path is required (no default template configured)', FillErrorCode.INVALID_ARGUMENTS);
    }
    return new FileTemplateSource(chosen, config.templateDir);
  };

  return async (name: string, args: unknown): Promise<ToolResponse> => {
    try {
      switch (name) {
        case 'fill_template': {
          const parsed = parseArgs(FillTemplateArgsSchema, args);
          const source = templateSource(parsed.template_path);
          const sink = new FileDocumentSink(parsed.output_path ?? config.defaultOutput, config.outputDir);

          const result = await fillToSink(filler, source, sink, {
            placeholders: parsed.placeholders,
            images: parsed.images,
          });

          if (config.verbose) {
            console.error(
              `[DOCX FILLER] Filled ${source.describe()} -> ${result.location} ` +
                `(${result.report.replacedTokens.length} text, ${result.report.insertedImages.length} images, ` +
                `${result.report.unresolvedTokens.length} unresolved)`
            );
          }

          return success({
            output_path: result.location,
            bytes: result.bytes,
            report: result.report,
          });
        }

        case 'list_placeholders': {
          const parsed = parseArgs(ListPlaceholdersArgsSchema, args);
          const source = templateSource(parsed.template_path);
          const placeholders = await filler.inspect(await source.read());
          return success({ template_path: source.describe(), placeholders });
        }

        case 'get_image_sizes': {
          return success({
            unit: 'inches',
            widths: filler.imageWidths,
          });
        }

        case 'health': {
          return success({ status: 'ok', version: SERVER_VERSION });
        }

        default:
          return error(new FillError(`Unknown tool: ${name}`, FillErrorCode.INVALID_ARGUMENTS));
      }
    } catch (err) {
      if (config.verbose) {
        console.error(`[DOCX FILLER] ${name} failed:`, err);
      }
      return error(err);
    }
  };
}

// ============================================================
// Helper Functions
// ============================================================

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new FillError(`Invalid arguments: ${issues.join('; ')}`, FillErrorCode.INVALID_ARGUMENTS, { issues });
  }
  return parsed.data;
}

function success(data: unknown): ToolResponse {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

function error(err: unknown): ToolResponse {
  const body =
    err instanceof FillError
      ? { error: err.message, code: err.code, context: err.context }
      : { error: err instanceof Error ? err.message : String(err), code: FillErrorCode.FILL_FAILED };
  return { content: [{ type: 'text', text: JSON.stringify(body) }] };
}
