export interface ContextMessage {
  message: string;
  fileName?: string;
  lineNumber?: number;
  lineCount?: number;
}

/**
 * Prefix a user message with the file location it is about.
 * The labels and blank-line separators are what the session expects; keep them stable.
 */
export function composeContextMessage(ctx: ContextMessage): string {
  const { message, fileName, lineNumber = 0, lineCount = 0 } = ctx;
  if (fileName === undefined) {
    return message;
  }

  let text = `File name: ${fileName}\n\nline number: ${lineNumber}\n\n`;
  if (lineCount !== 0) {
    text += `line count: ${lineCount}\n\n`;
  }
  return text + message;
}

export function composeRegionMessage(region: string, message?: string): string {
  return message ? `${region}\n\n${message}` : region;
}
