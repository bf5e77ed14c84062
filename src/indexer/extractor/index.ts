/**
 * Extractor Module
 *
 * Converts uploaded PDF, DOCX and text files into plain text.
 */

export {
  detectFileKind,
  decodeText,
  extractText,
  readUploadedFile,
  SUPPORTED_EXTENSIONS,
  type FileKind,
  type UploadedFile,
} from './extractor.js';
