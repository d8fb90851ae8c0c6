export * from './ffmpeg/index.js';
