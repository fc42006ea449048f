export type { CaptureFlags, CaptureOptions, ResolvedCaptureOptions } from './options.js';
export { resolveCaptureOptions } from './options.js';
export { validateCaptureOptions } from './validation.js';
