// Failures raised by the offset chain. Each names the parameter at fault
// and the constraint it broke.

export class OffsetError extends Error {
  constructor(
    message: string,
    public readonly parameter: string,
    public readonly constraint: string,
    public readonly value: number,
  ) {
    super(message);
    this.name = "OffsetError";
  }
}

/** An input outside its documented domain. Raised before any computation. */
export class ValidationError extends OffsetError {
  constructor(parameter: string, constraint: string, value: number) {
    super(`${parameter} must be ${constraint} (got ${value})`, parameter, constraint, value);
    this.name = "ValidationError";
  }
}

/** Valid inputs that land on a point where the geometry is undefined. */
export class SingularityError extends OffsetError {
  constructor(parameter: string, constraint: string, value: number) {
    super(`${parameter} ${constraint} (got ${value})`, parameter, constraint, value);
    this.name = "SingularityError";
  }
}
