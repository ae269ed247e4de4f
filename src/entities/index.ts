export * from './knowledge-chunk.entity';
