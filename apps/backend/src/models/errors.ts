export class DuplicateEntityError extends Error {
  constructor(kind: "car" | "intersection", id: number) {
    super(`A ${kind} with id ${id} already exists`);
    this.name = "DuplicateEntityError";
  }
}

export class EntityNotFoundError extends Error {
  constructor(kind: "car" | "intersection", id: number) {
    super(`No ${kind} with id ${id}`);
    this.name = "EntityNotFoundError";
  }
}

export class InvalidEntityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidEntityError";
  }
}
