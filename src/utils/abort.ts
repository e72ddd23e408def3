/**
 * Forwards an abort from `parent` to `controller`. Returns the function that
 * detaches the listener once the child is done.
 */
export function linkAbortSignal(
  parent: AbortSignal | undefined,
  controller: AbortController
): () => void {
  if (!parent) return () => undefined;

  if (parent.aborted) {
    controller.abort(parent.reason);
    return () => undefined;
  }

  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return () => parent.removeEventListener('abort', onAbort);
}
