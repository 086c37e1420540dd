// runs tasks one at a time in submission order
export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // the caller observes the failure through result; the queue moves on
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
