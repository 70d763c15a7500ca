export * from './bmp'
export * from './file'
export * from './jpeg'
export * from './ppm'
