import { setup } from "../actions";
import { Command } from "../command";

Command.register({
    name: "setup",
    alt: ["up", "start"],
    help: "install Docker if needed, write versions, create addon folders and start the services",
    options: ["*"],
    defaultOption: "directory",
    handler: setup,
});
