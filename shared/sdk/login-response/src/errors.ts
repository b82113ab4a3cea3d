export class NotAuthorizedError extends Error {
    public readonly resource?: string;

    constructor(message: string, resource?: string) {
        super(message);
        this.name = 'NotAuthorizedError';
        this.resource = resource;
    }
}

export class BadRequestError extends Error {
    public readonly resource?: string;

    constructor(message: string, resource?: string) {
        super(message);
        this.name = 'BadRequestError';
        this.resource = resource;
    }
}

export class NotFoundError extends Error {
    public readonly resource?: string;

    constructor(message: string, resource?: string) {
        super(message);
        this.name = 'NotFoundError';
        this.resource = resource;
    }
}

/**
 * Raised when a login page was chosen but could not be produced because a
 * collaborator failed. Fatal for the request; the failure is kept as `cause`.
 */
export class LoginPageError extends Error {
    public readonly loginPage: string;

    constructor(message: string, loginPage: string, cause: unknown) {
        super(message, { cause });
        this.name = 'LoginPageError';
        this.loginPage = loginPage;
    }
}

export class LoginConfigError extends Error {
    public readonly details: string[];

    constructor(details: string[]) {
        super(`Invalid login response config: ${details.join('; ')}`);
        this.name = 'LoginConfigError';
        this.details = details;
    }
}
