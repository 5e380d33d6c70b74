import { help } from "../actions";
import { Command } from "../command";

Command.register({
    name: "help",
    alt: ["usage"],
    help: "print this message",
    handler: help,
});
