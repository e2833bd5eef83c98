/**
 * Cola que ejecuta tareas de a una, en orden de llegada.
 * Una tarea que falla no bloquea a las siguientes.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
