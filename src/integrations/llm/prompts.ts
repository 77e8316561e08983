/**
 * Prompt builder for snippet explanations.
 */

/**
 * Build the prompt asking the model to explain a snippet.
 */
export function buildAnalysisPrompt(snippet: string): string {
  return `Please analyze and explain the following code:

\`\`\`
${snippet}
\`\`\`

Provide a clear explanation of what the code does, its structure,
and any notable patterns or potential issues. Include:

1. Overall purpose of the code
2. Breakdown of key functions/components
3. Potential bugs or edge cases
4. Performance considerations
`;
}
