export class TaskDomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidTaskError extends TaskDomainError {
  constructor(
    public readonly field: 'title' | 'description',
    message: string
  ) {
    super(message);
  }
}
