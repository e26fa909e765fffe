import { z } from 'zod';

export const RenderLatexSchema = z.object({
  latex: z.string().describe("LaTeX expression e.g. 'x^2 + y^2 = z^2'. No $ delimiters."),
  font_size: z
    .number()
    .positive()
    .optional()
    .default(15)
    .describe('Font size / DPI scale; rendered at font_size * 10 dpi (default 15 = 150 dpi)'),
  bg_color: z.string().optional().default('white').describe("Background color (default 'white')"),
  text_color: z.string().optional().default('black').describe("Equation color (default 'black')"),
});

export const RenderSolutionSchema = z.object({
  problem_description: z
    .string()
    .optional()
    .describe("Plain-English problem e.g. 'Solve for x: 2x + 4 = 10'"),
  steps_latex: z
    .array(z.string())
    .describe("LaTeX for each step e.g. ['2x+4=10', '2x=6']. May be empty."),
  final_answer_latex: z.string().describe("LaTeX for the final answer only e.g. 'x = 3'"),
  dpi: z.number().int().positive().optional().default(200).describe('Image resolution (default 200)'),
  theme: z
    .enum(['light', 'dark'])
    .optional()
    .default('light')
    .describe("Color theme: 'light' (white background) or 'dark'"),
});

export const GetImageUrlSchema = z.object({
  latex: z.string().describe('LaTeX expression. No $ delimiters.'),
  dpi: z.number().int().positive().optional().default(200).describe('Resolution (default 200)'),
  color: z.string().optional().default('black').describe("Text color (default 'black')"),
});

export const CheckLatexSyntaxSchema = z.object({
  latex: z.string().describe('LaTeX expression to check before rendering'),
});

export type RenderLatexArgs = z.infer<typeof RenderLatexSchema>;
export type RenderSolutionArgs = z.infer<typeof RenderSolutionSchema>;
export type GetImageUrlArgs = z.infer<typeof GetImageUrlSchema>;
export type CheckLatexSyntaxArgs = z.infer<typeof CheckLatexSyntaxSchema>;
