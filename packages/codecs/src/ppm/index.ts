export { PpmCodec } from './codec'
export { decodePpm } from './decoder'
export { encodePpm, encodePpmAscii } from './encoder'
export * from './types'
