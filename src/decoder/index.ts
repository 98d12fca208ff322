export * from './wgrib2-decoder';
