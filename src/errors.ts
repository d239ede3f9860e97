/**
 * Thrown when a target cannot be resolved to a function descriptor:
 * either it is not callable at all, or it is a function nobody described.
 */
export class SignatureUnavailableError extends Error {
    readonly reason: "not-callable" | "no-signature";

    constructor(reason: "not-callable" | "no-signature", message: string) {
        super(message);
        this.name = "SignatureUnavailableError";
        this.reason = reason;
    }
}

/** Thrown when a tool fails the compatibility gate or its name is taken. */
export class ToolRegistrationError extends Error {
    readonly toolName: string;
    readonly reasons: string[];

    constructor(toolName: string, reasons: string[]) {
        super(`Tool "${toolName}" cannot be registered: ${reasons.join("; ")}`);
        this.name = "ToolRegistrationError";
        this.toolName = toolName;
        this.reasons = reasons;
    }
}

/** Thrown when a tool's arguments do not validate or its implementation throws. */
export class ToolExecutionError extends Error {
    readonly toolName: string;

    constructor(toolName: string, message: string, options?: { cause?: unknown }) {
        super(`Tool "${toolName}" failed: ${message}`, options);
        this.name = "ToolExecutionError";
        this.toolName = toolName;
    }
}
