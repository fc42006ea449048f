import { AsyncLocalStorage } from 'node:async_hooks';
import { DEFAULTS } from '../constants.js';
import { truncateString } from '../utils/truncate.js';

/**
 * Holder of the optional "reason for change" comment of the current request
 *
 * @remarks
 * The caller sets the comment before flushing; every log entry built during that
 * flush carries it; the flush cycle clears it once its post-commit phase is over.
 */
export interface CommentContext {
  /** Set the comment, or remove it with `null`. Long comments are truncated. */
  setMessage(message: string | null): void;

  getMessage(): string | null;

  isMessageSet(): boolean;

  clearMessage(): void;

  /**
   * Run a function with its own comment slot
   *
   * @remarks
   * Async work started inside `fn` sees the same slot, so concurrent requests
   * never share a comment. Outside any `run` a single process-level slot is used.
   */
  run<T>(fn: () => T): T;
}

export interface CommentContextOptions {
  /** @default 255 */
  maxLength?: number;
}

interface CommentSlot {
  message: string | null;
}

/**
 * Create an AsyncLocalStorage-based comment context
 *
 * @example
 * ```typescript
 * const comments = createCommentContext();
 *
 * await comments.run(async () => {
 *   comments.setMessage('Stock correction after inventory count');
 *   await entityManager.flush();
 *   comments.isMessageSet(); // => false
 * });
 * ```
 */
export const createCommentContext = (options: CommentContextOptions = {}): CommentContext => {
  const maxLength = options.maxLength ?? DEFAULTS.MAX_COMMENT_LENGTH;
  const storage = new AsyncLocalStorage<CommentSlot>();
  const processSlot: CommentSlot = { message: null };

  const currentSlot = (): CommentSlot => storage.getStore() ?? processSlot;

  return {
    setMessage: (message: string | null): void => {
      currentSlot().message =
        message === null ? null : truncateString(message, maxLength, DEFAULTS.TRUNCATION_MARKER);
    },

    getMessage: (): string | null => currentSlot().message,

    isMessageSet: (): boolean => currentSlot().message !== null,

    clearMessage: (): void => {
      currentSlot().message = null;
    },

    run: <T>(fn: () => T): T => storage.run({ message: null }, fn),
  };
};
