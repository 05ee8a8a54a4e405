export type RelayErrorCode =
  | 'NO_PROJECT_ROOT'
  | 'NO_SESSION_FOUND'
  | 'EMPTY_SELECTION'
  | 'INVALID_REQUEST';

/** Error reported back to the user; ends the operation that raised it. */
export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NoProjectRootError extends RelayError {
  readonly path: string;

  constructor(path: string) {
    super('NO_PROJECT_ROOT', `Not inside a project: ${path}`);
    this.path = path;
  }
}

export class NoSessionFoundError extends RelayError {
  readonly sessionName: string;

  constructor(sessionName: string) {
    super('NO_SESSION_FOUND', `No running session named ${sessionName}. Start one first.`);
    this.sessionName = sessionName;
  }
}

export class EmptySelectionError extends RelayError {
  constructor() {
    super('EMPTY_SELECTION', 'No text selected');
  }
}

export class InvalidRequestError extends RelayError {
  constructor(message: string) {
    super('INVALID_REQUEST', message);
  }
}
