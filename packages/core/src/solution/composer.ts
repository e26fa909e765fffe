/**
 * Lay out solution steps and a boldfaced answer as one right/left aligned array.
 *
 * A single step is labelled "Work:" rather than "Step 1:". With no steps the
 * array holds only the answer row.
 */
export function composeSolution(steps: string[], answer: string): string {
  const stepRows = steps.map((step, i) =>
    steps.length > 1 ? `\\text{Step ${i + 1}: } & ${step} \\\\` : `\\text{Work: } & ${step} \\\\`
  );

  return [
    '\\begin{array}{rl}',
    ...stepRows,
    `\\textbf{Answer: } & \\boldsymbol{${answer}}`,
    '\\end{array}',
  ].join(' ');
}
