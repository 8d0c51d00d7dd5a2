// Application layer - turning user text into compressor options

export * from './options';
