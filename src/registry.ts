import { ToolRegistrationError } from "./errors.js";
import type { EventBus } from "./event-bus.js";
import { checkCompatibility } from "./function-schema.js";
import type { FunctionTool } from "./tool.js";
import type { ToolDefinition } from "./types.js";

/**
 * Stores the tools a model may call. Every tool passes the strict
 * compatibility gate on the way in, and names are unique.
 */
export class ToolRegistry {
    private tools = new Map<string, FunctionTool>();

    constructor(private readonly eventBus?: EventBus) {}

    /**
     * Register a tool.
     * @throws ToolRegistrationError if the name is taken or the descriptor is incompatible.
     */
    register(tool: FunctionTool): void {
        if (this.tools.has(tool.name)) {
            throw new ToolRegistrationError(tool.name, [
                `Tool "${tool.name}" is already registered.`,
            ]);
        }
        const report = checkCompatibility(tool.descriptor);
        if (!report.compatible) {
            this.eventBus?.emit("tool:rejected", {
                name: tool.name,
                reasons: report.reasons,
            });
            throw new ToolRegistrationError(tool.name, report.reasons);
        }
        this.tools.set(tool.name, tool);
        this.eventBus?.emit("tool:registered", { name: tool.name });
    }

    /** Retrieve a tool by name. */
    get(name: string): FunctionTool | undefined {
        return this.tools.get(name);
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    /** All registered tools, in registration order. */
    list(): FunctionTool[] {
        return Array.from(this.tools.values());
    }

    /** Tool entries for a chat-completion request. */
    toToolDefinitions(): ToolDefinition[] {
        return this.list().map((tool) => tool.toJSON());
    }
}
