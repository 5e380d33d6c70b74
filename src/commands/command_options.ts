import { type Command } from "../command";
import { DEFAULT_REPOSITORY, LocalError, setDebug } from "../constants";
import { type Resolver } from "../utils";

export interface CommandOptionDefinition {
    autoInclude?: boolean;
    alt?: string[];
    defaultValues?: Resolver<string[]>;
    effect?: (command: Command) => unknown;
    /** Argument forwarded when the process re-executes itself */
    flag?: string;
    help?: string;
    /** Internal options are accepted but left out of the usage text */
    hidden?: boolean;
    name: string;
    parse?: (values: string[]) => string[] | PromiseLike<string[]>;
    short?: string;
    standalone?: boolean;
}

export type CommandOptionType = "short" | "long";

export type CommandOptionSpec =
    | string
    | Record<string, Partial<CommandOptionDefinition> | null>
    | [string, Partial<CommandOptionDefinition> | null];

export class CommandOption {
    static definitions: Map<string, CommandOptionDefinition> = new Map();

    static parse(...specs: CommandOptionSpec[]) {
        const result: Record<string, CommandOptionDefinition> = Object.create(null);
        const queue = [...specs];
        while (queue.length) {
            const spec = queue.shift();
            if (spec === undefined) {
                break;
            }
            const specObject: Exclude<CommandOptionSpec, string> =
                typeof spec === "string" ? [spec, null] : spec;
            if (!Array.isArray(specObject)) {
                queue.unshift(...Object.entries(specObject));
                continue;
            }
            if (specObject[0] === "*") {
                queue.unshift(...this.definitions.keys());
                continue;
            }
            const [name, override] = specObject;
            const base = result[name] ?? this.definitions.get(name);
            if (!base && !override) {
                throw new LocalError(`unknown option definition: "${name}"`);
            }
            result[name] = { ...base, ...override, name };
        }
        for (const option of this.definitions.values()) {
            if (option.autoInclude) {
                result[option.name] ||= option;
            }
        }
        return Object.values(result);
    }

    static register(definition: CommandOptionDefinition) {
        this.definitions.set(definition.name, definition);
        return definition;
    }

    definition: CommandOptionDefinition;
    values: string[] = [];

    get acceptsValues() {
        return !this.definition.standalone;
    }

    get value() {
        return this.values.join(",");
    }

    constructor(definition: CommandOptionDefinition) {
        this.definition = definition;
    }

    addValues(...values: string[]) {
        if (!this.acceptsValues) {
            throw new LocalError(`option '${this.definition.name}' does not accept any values`);
        }
        this.values.push(...values);
    }

    async applyEffect(command: Command) {
        if (this.definition.effect) {
            await this.definition.effect(command);
        }
    }

    async parseValues() {
        if (this.definition.parse) {
            this.values = await this.definition.parse(this.values);
        }
    }
}

CommandOption.register({
    name: "debug",
    autoInclude: true,
    flag: "--debug",
    help: "print debug logs",
    standalone: true,
    effect: () => setDebug(true),
});

CommandOption.register({
    name: "delete",
    short: "d",
    flag: "-d",
    help: "remove all containers and volumes, then exit",
    standalone: true,
});

CommandOption.register({
    name: "directory",
    alt: ["dir"],
    flag: "--directory",
    help: "folder holding the docker-compose file (default: current folder)",
    defaultValues: () => [process.cwd()],
});

CommandOption.register({
    name: "fresh",
    short: "f",
    flag: "-f",
    help: "remove volumes before restarting the services",
    standalone: true,
});

CommandOption.register({
    name: "post-install",
    hidden: true,
    standalone: true,
});

CommandOption.register({
    name: "repository",
    alt: ["repo"],
    flag: "--repository",
    help: `upstream repository used to detect versions (default: ${DEFAULT_REPOSITORY})`,
    defaultValues: [DEFAULT_REPOSITORY],
    parse: (values) => {
        const repository = values.join("").trim();
        if (!/^[\w.-]+\/[\w.-]+$/.test(repository)) {
            throw new LocalError(`invalid repository: "${repository}" (expected "owner/name")`);
        }
        return [repository];
    },
});

CommandOption.register({
    name: "restart",
    short: "r",
    flag: "-r",
    help: "stop and start the services, then exit",
    standalone: true,
});
