/** A kill, forward or lookup that did not succeed */
export class ActionError extends Error {
  constructor(
    message: string,
    readonly action: string
  ) {
    super(message);
    this.name = "ActionError";
  }
}
