export {
  TiktokenTokenizer,
  createTokenizer,
  encodingForModelName,
  DEFAULT_ENCODING,
  type Tokenizer,
} from './tokenizer.js';
