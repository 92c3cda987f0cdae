export * from './FrameCodec';
export * from './envelope';
