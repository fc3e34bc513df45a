export { SharpImageDecoderAdapter } from './sharp-image-decoder.adapter';
