/**
 * Generator barrel.
 */
export * from './abstime'
