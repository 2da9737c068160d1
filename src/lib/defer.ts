// run on the next turn of the event loop so deep chains of synchronous callbacks do not grow the stack
export function defer(fn: () => void): void {
  setImmediate(fn);
}
