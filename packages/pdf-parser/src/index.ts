export { DocumentTextAcquirer } from './core/document-text-acquirer';
export type { DocumentTextAcquirerOptions } from './core/document-text-acquirer';
export { ToolEnvironment, parseTesseractLanguages } from './environment/tool-environment';
export type { ToolEnvironmentReport } from './environment/tool-environment';
export { DocumentNotFoundError } from './errors/document-not-found-error';
export { TextExtractionError } from './errors/text-extraction-error';
export {
  ImagePreprocessor,
  buildPreprocessArgs,
} from './processors/image-preprocessor';
export { OcrRecognizer } from './processors/ocr-recognizer';
export type { OcrRecognizerOptions } from './processors/ocr-recognizer';
export {
  MagickPageRenderer,
  PdftoppmPageRenderer,
  selectPageRenderer,
} from './processors/page-renderer';
export type {
  PageRenderResult,
  PageRenderer,
  PageRendererBackend,
  PageRendererOptions,
} from './processors/page-renderer';
export { PdfTextExtractor } from './processors/pdf-text-extractor';
export {
  IMAGE_PREPROCESSOR,
  OCR_RECOGNIZER,
  TEXT_ACQUIRER,
} from './config/constants';
