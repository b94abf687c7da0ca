export class QueueClosedError extends Error {
  constructor(queueName: string) {
    super(`Queue ${queueName} is closed`);
    this.name = 'QueueClosedError';
    Object.setPrototypeOf(this, QueueClosedError.prototype);
  }
}
