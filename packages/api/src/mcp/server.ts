import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { LocalRenderer, createRenderer } from '@mathshot/core';
import type { AppConfig } from '../config';
import {
  CheckLatexSyntaxSchema,
  GetImageUrlSchema,
  RenderLatexSchema,
  RenderSolutionSchema,
} from '../schemas/tools';
import { checkLatexSyntax, getImageUrl, renderLatex, renderSolution, type ToolDeps } from './tools';

export const SERVER_NAME = 'mathshot';
export const SERVER_VERSION = '0.1.0';

const INSTRUCTIONS =
  'Use render_solution after solving a math problem to send the worked steps as one PNG image. ' +
  'Use render_latex for a single expression and get_image_url when only a link is needed. ' +
  'Pass raw LaTeX without $ delimiters.';

export function createToolDeps(config: AppConfig): ToolDeps {
  const renderer = createRenderer(config.renderMode, {
    baseUrl: config.renderBaseUrl,
    timeoutMs: config.fetchTimeoutMs,
  });
  const validator = renderer instanceof LocalRenderer ? renderer : new LocalRenderer();

  return {
    renderer,
    baseUrl: config.renderBaseUrl,
    validate: (latex) => validator.validate(latex),
  };
}

export function createMcpServer(deps: ToolDeps): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: INSTRUCTIONS }
  );
  const openWorldHint = deps.renderer.mode === 'remote';

  server.registerTool(
    'render_latex',
    {
      title: 'Render LaTeX to Image',
      description:
        'Render a single LaTeX expression and return it as a PNG image. Do NOT wrap latex in dollar signs.',
      inputSchema: RenderLatexSchema.shape,
      annotations: { readOnlyHint: true, idempotentHint: true, openWorldHint },
    },
    (args) => renderLatex(args, deps)
  );

  server.registerTool(
    'render_solution',
    {
      title: 'Render Step-by-Step Solution',
      description:
        'Render a complete step-by-step math solution as a PNG image. PRIMARY tool to call after solving any math problem. Do NOT wrap any LaTeX strings in dollar signs.',
      inputSchema: RenderSolutionSchema.shape,
      annotations: { readOnlyHint: true, idempotentHint: true, openWorldHint },
    },
    (args) => renderSolution(args, deps)
  );

  server.registerTool(
    'get_image_url',
    {
      title: 'Get Hosted Image URL',
      description:
        'Return a hosted image URL for a LaTeX expression without fetching it. Messaging clients can render the link inline.',
      inputSchema: GetImageUrlSchema.shape,
      annotations: { readOnlyHint: true, idempotentHint: true, openWorldHint: false },
    },
    (args) => getImageUrl(args, deps)
  );

  server.registerTool(
    'check_latex_syntax',
    {
      title: 'Check LaTeX Syntax',
      description:
        'Check a LaTeX expression for problems that would stop it rendering. Returns JSON with valid, warnings and errors.',
      inputSchema: CheckLatexSyntaxSchema.shape,
      annotations: { readOnlyHint: true, idempotentHint: true, openWorldHint: false },
    },
    (args) => checkLatexSyntax(args, deps)
  );

  return server;
}
