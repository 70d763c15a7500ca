export { JpegCodec } from './codec'
export { decodeJpeg } from './decoder'
export { DEFAULT_QUALITY, encodeJpeg } from './encoder'
