/**
 * Per-key task serialization.
 *
 * Tasks that share a key run one at a time in arrival order, so a user's
 * second message is always classified against the state committed by the
 * first. Different keys never wait on each other.
 */
export class KeyedSerializer {
  private readonly tails = new Map<string, Promise<void>>()

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    // The chain continues whether or not this task fails
    const tail = result.then(
      () => undefined,
      () => undefined,
    )
    this.tails.set(key, tail)
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key)
    })
    return result
  }

  /** Keys with a running or queued task. */
  get activeKeys(): number {
    return this.tails.size
  }
}
