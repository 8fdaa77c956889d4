/**
 * @fileoverview Tools module public exports.
 *
 * @module research-loop/tools
 * @version 0.1.0
 */

export {
  createWebSearchTool,
  createFetchPageTool,
  createWaitTool,
  type SearchProvider,
  type SearchResult,
  type FetchPageOptions,
  type WaitToolOptions,
} from './research.js';

export { extractText, decodeEntities, type ExtractedPage } from './html-text.js';
