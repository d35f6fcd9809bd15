export const SYSTEM_PROMPT =
  "You are devexplain, an expert developer assistant. " +
  "You provide clear, structured, and accurate explanations. " +
  "Use markdown formatting in your responses.";

export const SYSTEM_PROMPT_TLDR =
  "You are devexplain, an expert developer assistant. " +
  "Respond with ONLY a single short sentence (max 15 words). " +
  "No markdown, no bullet points, no extra explanation. Just one line.";

/** Error output longer than this is cut before it goes into the failure prompt */
export const FAILURE_OUTPUT_LIMIT = 2000;

export function chatSystemPrompt(languageName: string): string {
  return (
    "You are devexplain, a helpful developer assistant. " +
    "Provide clear, structured, and accurate responses. " +
    "Use markdown formatting. " +
    `Respond in ${languageName}.`
  );
}

export function commandPrompt(command: string, languageName: string): string {
  return `Explain this shell command in detail, step by step.
Command: ${command}

Please explain:
1. What this command does overall
2. Break down each part/flag/argument
3. Common use cases
4. Any warnings or cautions

Language: Respond in ${languageName}`;
}

export function errorPrompt(errorMessage: string, context: string | undefined, languageName: string): string {
  const contextPart = context ? `\nContext:\n${context}` : "";
  return `Explain this error message and suggest how to fix it.
Error: ${errorMessage}
${contextPart}

Please provide:
1. What this error means
2. Common causes
3. Step-by-step solutions
4. How to prevent it in the future

Language: Respond in ${languageName}`;
}

export function codePrompt(code: string, filename: string | undefined, languageName: string): string {
  const fileContext = filename ? ` (from ${filename})` : "";
  return `Explain this code${fileContext} in detail.

\`\`\`
${code}
\`\`\`

Please explain:
1. Overall purpose of this code
2. How it works step by step
3. Key concepts and patterns used
4. Potential improvements or issues

Language: Respond in ${languageName}`;
}

export function diffPrompt(diffText: string, ref: string, languageName: string): string {
  const refContext = ref ? ` (ref: ${ref})` : "";
  return `Explain this git diff${refContext} in detail.

\`\`\`diff
${diffText}
\`\`\`

Please explain:
1. Summary of all changes
2. What each changed file/section does
3. Potential impact or risks of these changes
4. Any suggestions for improvement

Language: Respond in ${languageName}`;
}

export function autoPrompt(content: string, languageName: string): string {
  return `Analyze and explain the following terminal/code output.
First determine what it is (error message, code, command output, log, etc.), then explain it.

\`\`\`
${content}
\`\`\`

Please provide:
1. What type of content this is
2. Detailed explanation
3. If it's an error: causes and solutions
4. If it's code: how it works and potential improvements
5. If it's output: what it means and any notable items

Language: Respond in ${languageName}`;
}

export function failurePrompt(
  command: string,
  exitCode: number,
  errorOutput: string,
  languageName: string,
): string {
  return `A developer ran this command and it failed. Explain what went wrong and how to fix it.

Command: ${command}
Exit code: ${exitCode}
Error output:
${errorOutput.slice(0, FAILURE_OUTPUT_LIMIT)}

Please provide:
1. What the command was trying to do
2. Why it failed
3. Step-by-step fix
4. The corrected command (if applicable)

Language: Respond in ${languageName}`;
}
