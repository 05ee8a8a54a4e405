/** Non-interactive runs of the CLI, outside any terminal session. */
export interface OneShotRunner {
  runPrint(root: string, prompt: string, onChunk: (chunk: string) => void): Promise<void>;
}
