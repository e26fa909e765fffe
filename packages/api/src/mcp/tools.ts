import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import {
  applyTheme,
  buildLocator,
  composeSolution,
  lintLatex,
  stripDelimiters,
  type ImageRenderer,
  type LatexValidator,
} from '@mathshot/core';
import type {
  CheckLatexSyntaxArgs,
  GetImageUrlArgs,
  RenderLatexArgs,
  RenderSolutionArgs,
} from '../schemas/tools';
import { encodeResult } from './encoder';

export interface ToolDeps {
  renderer: ImageRenderer;
  baseUrl?: string;
  validate?: LatexValidator;
}

export async function renderLatex(args: RenderLatexArgs, deps: ToolDeps): Promise<CallToolResult> {
  const expression = stripDelimiters(args.latex);
  const dpi = Math.max(1, Math.round(args.font_size * 10));

  console.error(`Rendering LaTeX (len=${expression.length}, dpi=${dpi}, mode=${deps.renderer.mode})`);
  const result = await deps.renderer.render({
    expression,
    dpi,
    color: args.text_color,
    background: args.bg_color,
  });
  return encodeResult(result);
}

export async function renderSolution(args: RenderSolutionArgs, deps: ToolDeps): Promise<CallToolResult> {
  const { background, foreground } = applyTheme(args.theme);
  const expression = composeSolution(
    args.steps_latex.map(stripDelimiters),
    stripDelimiters(args.final_answer_latex)
  );

  console.error(`Rendering solution (steps=${args.steps_latex.length}, dpi=${args.dpi}, mode=${deps.renderer.mode})`);
  const result = await deps.renderer.render({
    expression,
    dpi: args.dpi,
    color: foreground,
    background,
  });
  return encodeResult(result);
}

export function getImageUrl(args: GetImageUrlArgs, deps: ToolDeps): CallToolResult {
  const url = buildLocator(stripDelimiters(args.latex), args.dpi, args.color, { baseUrl: deps.baseUrl });
  return { content: [{ type: 'text', text: url }] };
}

export function checkLatexSyntax(args: CheckLatexSyntaxArgs, deps: ToolDeps): CallToolResult {
  const report = lintLatex(args.latex, deps.validate);
  return { content: [{ type: 'text', text: JSON.stringify(report, null, 2) }] };
}
