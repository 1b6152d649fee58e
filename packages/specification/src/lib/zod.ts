import { z } from "zod";

import { RawNumericId } from "./schema";

/**
 * Zod v4 schemas for the envelope and for the params of every client message
 * the server routes.
 *
 * These schemas implement the Standard Schema interface automatically (via Zod v4),
 * so they can be consumed by the SDK's StandardSchemaValidator.
 */

export const JsonRpcVersionSchema = z.literal("2.0");

export const RequestIdSchema = z.union([z.string(), z.number(), z.instanceof(RawNumericId)]);

export const CursorSchema = z.string();

export const PaginatedRequestParamsSchema = z
  .object({
    cursor: CursorSchema.optional()
  })
  .passthrough();

/**
 * Params of methods that take none. Extra members are tolerated.
 */
export const EmptyRequestParamsSchema = z.object({}).passthrough().optional();

export const JsonRpcErrorSchema = z
  .object({
    code: z.number().int(),
    message: z.string(),
    data: z.unknown().optional()
  })
  .passthrough();

export const JsonRpcRequestSchema = z.object({
  jsonrpc: JsonRpcVersionSchema,
  id: RequestIdSchema,
  method: z.string(),
  params: z.record(z.string(), z.unknown()).optional()
});

export const JsonRpcNotificationSchema = z.object({
  jsonrpc: JsonRpcVersionSchema,
  method: z.string(),
  params: z.record(z.string(), z.unknown()).optional()
});

export const JsonRpcResultResponseSchema = z.object({
  jsonrpc: JsonRpcVersionSchema,
  id: RequestIdSchema,
  result: z.record(z.string(), z.unknown())
});

export const JsonRpcErrorResponseSchema = z.object({
  jsonrpc: JsonRpcVersionSchema,
  id: z.union([RequestIdSchema, z.null()]),
  error: JsonRpcErrorSchema
});

// -----------------------------------------------------------------------------
// Lifecycle
// -----------------------------------------------------------------------------

export const ImplementationSchema = z
  .object({
    name: z.string(),
    version: z.string()
  })
  .passthrough();

export const ClientCapabilitiesSchema = z
  .object({
    experimental: z.record(z.string(), z.object({}).passthrough()).optional(),
    roots: z
      .object({
        listChanged: z.boolean().optional()
      })
      .passthrough()
      .optional(),
    sampling: z.record(z.string(), z.unknown()).optional()
  })
  .passthrough();

export const InitializeRequestParamsSchema = z
  .object({
    protocolVersion: z.string().optional(),
    capabilities: ClientCapabilitiesSchema.optional(),
    clientInfo: ImplementationSchema.optional()
  })
  .passthrough();

export const CancelledNotificationParamsSchema = z
  .object({
    requestId: RequestIdSchema,
    reason: z.string().optional()
  })
  .passthrough();

// -----------------------------------------------------------------------------
// Capabilities
// -----------------------------------------------------------------------------

export const ReadResourceRequestParamsSchema = z
  .object({
    uri: z.string().min(1)
  })
  .passthrough();

export const CallToolRequestParamsSchema = z
  .object({
    name: z.string(),
    arguments: z.record(z.string(), z.unknown()).optional()
  })
  .passthrough();

export const GetPromptRequestParamsSchema = z
  .object({
    name: z.string(),
    arguments: z.record(z.string(), z.string()).optional()
  })
  .passthrough();

// -----------------------------------------------------------------------------
// Logging
// -----------------------------------------------------------------------------

export const LoggingLevelSchema = z.enum(["debug", "info", "notice", "warning", "error", "critical", "alert", "emergency"]);

export const SetLevelRequestParamsSchema = z
  .object({
    level: LoggingLevelSchema
  })
  .passthrough();

export const LoggingMessageNotificationSchema = z.object({
  jsonrpc: JsonRpcVersionSchema,
  method: z.literal("notifications/message"),
  params: z.object({
    level: LoggingLevelSchema,
    logger: z.string().optional(),
    data: z.unknown()
  })
});

export const ResourceUpdatedNotificationSchema = z.object({
  jsonrpc: JsonRpcVersionSchema,
  method: z.literal("notifications/resources/updated"),
  params: z.object({
    uri: z.string()
  })
});

export const ListChangedNotificationSchema = z.object({
  jsonrpc: JsonRpcVersionSchema,
  method: z.enum(["notifications/resources/list_changed", "notifications/tools/list_changed", "notifications/prompts/list_changed"]),
  params: z.record(z.string(), z.unknown()).optional()
});

// -----------------------------------------------------------------------------
// Results
// -----------------------------------------------------------------------------

export const TextContentSchema = z.object({
  type: z.literal("text"),
  text: z.string()
});

export const ImageContentSchema = z.object({
  type: z.literal("image"),
  data: z.string(),
  mimeType: z.string()
});

export const EmbeddedResourceSchema = z.object({
  type: z.literal("resource"),
  resource: z.union([
    z.object({ uri: z.string(), mimeType: z.string().optional(), text: z.string() }),
    z.object({ uri: z.string(), mimeType: z.string().optional(), blob: z.string() })
  ])
});

export const ContentBlockSchema = z.union([TextContentSchema, ImageContentSchema, EmbeddedResourceSchema]);

export const CallToolResultSchema = z
  .object({
    content: z.array(ContentBlockSchema),
    isError: z.boolean().optional()
  })
  .passthrough();

export const InitializeResultSchema = z
  .object({
    protocolVersion: z.string(),
    capabilities: z.record(z.string(), z.unknown()),
    serverInfo: ImplementationSchema,
    instructions: z.string().optional()
  })
  .passthrough();
