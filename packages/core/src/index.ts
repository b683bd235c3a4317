import {
  Book,
  BookItem,
  Chapter,
  isChapterItem,
  mapChapters,
} from './book.js';
import {
  type FootnoteConfig,
  defaultFootnoteConfig,
  getConfigValue,
  MARKDOWN_OPTION,
  resolveFootnoteConfig,
} from './config.js';
import {
  decodePreprocessorInput,
  encodeBook,
  PreprocessorContext,
  PreprocessorInput,
} from './input.js';
import {
  type ChapterReport,
  type PreprocessResult,
  PREPROCESSOR_NAME,
  preprocessBook,
} from './preprocessor.js';
import {
  type FootnoteEntry,
  type FootnoteRenderer,
  type FootnoteStyle,
  hyperlinkRenderer,
  markdownRenderer,
  renderFootnoteList,
  rendererFor,
} from './renderer.js';
import {
  HTML_RENDERERS,
  hyperlinkStyleAdvisory,
  supportsRenderer,
  UNSUPPORTED_RENDERER,
} from './renderers.js';
import { type MarkerMatch, scanMarkers } from './scanner.js';
import { type TransformResult, transformContent } from './transform.js';
import { isCompatibleHostVersion, PROTOCOL_VERSION } from './version.js';

export {
  Book,
  BookItem,
  Chapter,
  type ChapterReport,
  type FootnoteConfig,
  type FootnoteEntry,
  type FootnoteRenderer,
  type FootnoteStyle,
  type MarkerMatch,
  type PreprocessResult,
  type TransformResult,
  decodePreprocessorInput,
  defaultFootnoteConfig,
  encodeBook,
  getConfigValue,
  HTML_RENDERERS,
  hyperlinkRenderer,
  hyperlinkStyleAdvisory,
  isChapterItem,
  isCompatibleHostVersion,
  mapChapters,
  MARKDOWN_OPTION,
  markdownRenderer,
  PREPROCESSOR_NAME,
  PreprocessorContext,
  PreprocessorInput,
  preprocessBook,
  PROTOCOL_VERSION,
  renderFootnoteList,
  rendererFor,
  resolveFootnoteConfig,
  scanMarkers,
  supportsRenderer,
  transformContent,
  UNSUPPORTED_RENDERER,
};
