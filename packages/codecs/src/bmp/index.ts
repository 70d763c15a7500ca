export { BmpCodec, loadBmp, saveBmp } from './codec'
export { decodeBmp, readBmpHeaders, type BmpHeaders } from './decoder'
export { encodeBmp } from './encoder'
export * from './types'
