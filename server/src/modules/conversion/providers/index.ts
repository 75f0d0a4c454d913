export { createMarkitdownExtractor, isMarkitdownAvailable } from './markitdown.provider';
