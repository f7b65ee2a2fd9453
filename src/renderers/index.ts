import type { OutputFormat } from '../types.js';
import { JsonRenderer } from './json.js';
import type { Renderer } from './renderer.js';
import { TextRenderer } from './text.js';

export function createRenderer(format: OutputFormat): Renderer {
  return format === 'json' ? new JsonRenderer() : new TextRenderer();
}

export { JsonRenderer, TextRenderer };
export * from './renderer.js';
