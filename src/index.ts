#!/usr/bin/env node

/**
 * keyboard-tuning-mcp-server: MCP entry point.
 *
 * Registers tools and starts the stdio transport.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { executeMapScale, formatMapScaleResult } from "./tools/map-scale.js";
import { mapScaleSchema } from "./schemas/map-scale.js";
import { executeBuildTuningList, formatTuningListResult } from "./tools/tuning-list.js";
import { buildTuningListSchema } from "./schemas/tuning-list.js";
import { executeEncodeMts } from "./tools/mts.js";
import { encodeMtsSchema } from "./schemas/mts.js";
import { logger } from "./utils/log.js";

const server = new McpServer({
  name: "keyboard-tuning-mcp-server",
  version: "0.1.0",
});

// ---------------------------------------------------------------------------
// Tool: map_scale
// ---------------------------------------------------------------------------

server.tool(
  "map_scale",
  "Map a musical scale (cents, ratios or EDO steps) onto the 12 keys of a keyboard. " +
    "Returns, for each key used, its deviation in cents from 12-EDO, plus the keyboard mapping. " +
    "Quarter tones are rounded down or up as configured; unavoidable collisions are reported as errors.",
  mapScaleSchema,
  async (input) => {
    try {
      const result = executeMapScale(input);
      return { content: [{ type: "text", text: formatMapScaleResult(result) }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error mapping scale: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Tool: build_tuning_list
// ---------------------------------------------------------------------------

server.tool(
  "build_tuning_list",
  "Build the tuning list of a composition: map every scale of the composition to the keyboard, " +
    "then reduce them to as few tunings as possible (\"merge\") or one per scale (\"direct\"). " +
    "Keys left empty are filled from neighbouring tunings, then from the global fill tuning. " +
    "Optionally appends MTS octave tuning SysEx dumps.",
  buildTuningListSchema,
  async ({ composition, mts, realTime }) => {
    try {
      const result = await executeBuildTuningList({ composition });
      const text = formatTuningListResult(result, { mts, realTime });
      return { content: [{ type: "text", text }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error building tuning list: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Tool: encode_mts
// ---------------------------------------------------------------------------

server.tool(
  "encode_mts",
  "Encode 12 per-key deviations (cents, C first) as a MIDI Tuning Standard scale/octave tuning SysEx message. " +
    "Values outside the representable range are clamped.",
  encodeMtsSchema,
  async (input) => {
    try {
      const text = executeEncodeMts(input);
      return { content: [{ type: "text", text }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error encoding MTS message: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Start server
// ---------------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error: unknown) => {
  const msg = error instanceof Error ? error.message : String(error);
  logger.error(`Fatal error starting MCP server: ${msg}`);
  process.exit(1);
});
