import {
    CommandOption,
    type CommandOptionDefinition,
    type CommandOptionSpec,
    type CommandOptionType,
} from "./commands/command_options";
import { LocalError, R_FULL_MATCH, R_SHORT_MATCH, UsageError } from "./constants";
import { resolve } from "./utils";

export interface CommandDefinition {
    name: string;
    defaultOption?: string;
    alt?: string[];
    help?: string;
    handler: CommandHandler;
    options?: CommandOptionDefinition[];
}

export type CommandHandler = (command: Command, args: string[]) => unknown;

export const DEFAULT_COMMAND = "setup";
export const PROGRAM_NAME = "odoo-dev";

export class Command {
    static definitions: Map<string, CommandDefinition> = new Map();

    /**
     * Finds the command named by the first argument (removed from `args`), or
     * the default command when the first argument is an option.
     */
    static find(args: string[]) {
        let name = DEFAULT_COMMAND;
        if (args.length && !args[0].startsWith("-")) {
            name = String(args.shift()).toLowerCase();
        }
        const commandDefinition =
            this.definitions.get(name) ||
            [...this.definitions.values()].find((desc) => desc.alt?.includes(name));
        if (!commandDefinition) {
            throw new UsageError(`unknown command: "${name}"`);
        }
        return new this(commandDefinition);
    }

    /**
     * Builds a command from raw process arguments: options are matched by
     * their short (`-f`, `-fr`) or long (`--fresh`, `--dir=path`) names and
     * loose values go to the last value-accepting option, or to the default
     * option of the command.
     */
    static fromArgs(processArgs: string[]) {
        const args = [...processArgs];
        const remainingValues: string[] = [];
        const command = this.find(args);
        let lastOption: CommandOption | null = null;
        for (const arg of args) {
            let match;
            if ((match = arg.match(R_SHORT_MATCH))) {
                for (const short of match[1]) {
                    lastOption = command.registerOption(short, "short");
                }
            } else if ((match = arg.match(R_FULL_MATCH))) {
                lastOption = command.registerOption(match[1], "long");
                if (match[2] !== undefined) {
                    lastOption.addValues(match[2]);
                    lastOption = null;
                }
            } else if (lastOption?.acceptsValues) {
                lastOption.addValues(arg);
            } else {
                remainingValues.push(arg);
            }
        }
        if (remainingValues.length) {
            if (!command.definition.defaultOption) {
                const strRemaining = remainingValues.map((o) => `"${o}"`).join(", ");
                throw new UsageError(
                    `no default option for command '${command.definition.name}'; the following values were given without an option name: ${strRemaining}`
                );
            }
            const option = command.registerOption(command.definition.defaultOption, "long");
            option.addValues(...remainingValues);
        }
        return command;
    }

    static register(
        definition: Omit<CommandDefinition, "options"> & {
            options?: CommandOptionSpec[];
        }
    ) {
        const fullDefinition = {
            ...definition,
            options: CommandOption.parse(...(definition.options || [])),
        };
        this.definitions.set(definition.name, fullDefinition);
        return fullDefinition;
    }

    static usage() {
        const lines = [`usage: ${PROGRAM_NAME} [command] [options]`, "", "commands:"];
        for (const definition of this.definitions.values()) {
            const names = [definition.name, ...(definition.alt || [])].join(", ");
            lines.push(`    ${names.padEnd(24)}${definition.help || ""}`);
        }
        lines.push("", "options:");
        for (const option of CommandOption.definitions.values()) {
            if (option.hidden) {
                continue;
            }
            const names = [
                option.short && `-${option.short}`,
                `--${option.name}`,
                ...(option.alt || []).map((alt) => `--${alt}`),
            ]
                .filter(Boolean)
                .join(", ");
            lines.push(`    ${names.padEnd(24)}${option.help || ""}`);
        }
        return lines.join("\n");
    }

    definition: CommandDefinition;
    options: Record<string, CommandOption | undefined> = Object.create(null);

    get optionList() {
        return Object.values(this.options).filter(
            (option): option is CommandOption => option !== undefined
        );
    }

    constructor(definition: CommandDefinition) {
        this.definition = definition;
    }

    /**
     * Whether the option was given, or set by its default values.
     */
    has(optionName: string) {
        return Boolean(this.options[optionName]);
    }

    async processOptions() {
        // Auto-complete default options
        for (const { defaultValues, name } of this.definition.options || []) {
            if (name in this.options || !defaultValues) {
                continue;
            }
            const option = this.registerOption(name, "long");
            option.addValues(...(await resolve(defaultValues)));
        }

        // Parse option values (in parallel)
        await Promise.all(this.optionList.map((option) => option.parseValues()));

        // Apply option effects (sequentially)
        for (const option of this.optionList) {
            await option.applyEffect(this);
        }
    }

    registerOption(optionName: string, type: CommandOptionType) {
        const lower = optionName.toLowerCase();
        const optionDefinition = this.definition.options?.find((option) => {
            if (type === "short") {
                return option.short === lower;
            } else {
                return option.name === lower || option.alt?.includes(lower);
            }
        });
        if (!optionDefinition) {
            const prefix = type === "short" ? "-" : "--";
            throw new UsageError(
                `unknown option: "${prefix}${lower}" with command "${this.definition.name}"`
            );
        }
        let option = this.options[optionDefinition.name];
        if (!option) {
            option = new CommandOption(optionDefinition);
            this.options[optionDefinition.name] = option;
        }
        return option;
    }

    /**
     * Single value of a value-accepting option.
     */
    value(optionName: string) {
        const option = this.options[optionName];
        if (!option?.values.length) {
            throw new LocalError(`missing value for option: ${optionName}`);
        }
        return option.value;
    }

    async run() {
        // Generate the forwarded arguments from option values
        const args: string[] = [];
        for (const option of this.optionList) {
            if (!option.definition.flag) {
                continue;
            }
            args.push(option.definition.flag);
            if (option.values.length) {
                args.push(option.value);
            }
        }

        // Call command handler
        await this.definition.handler(this, args);
    }
}
