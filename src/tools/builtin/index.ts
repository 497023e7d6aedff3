import type { ToolFactory } from '../tool-system.js';
import { fileReadTool } from './file-read.js';
import { fileWriteTool } from './file-write.js';
import { getTimeTool } from './get-time.js';
import { shellExecuteTool } from './shell-execute.js';

export { fileReadTool, fileWriteTool, getTimeTool, shellExecuteTool };

export function builtinTools(): ToolFactory[] {
  return [fileReadTool, fileWriteTool, shellExecuteTool, getTimeTool];
}
