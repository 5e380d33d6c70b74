import { restart } from "../actions";
import { Command } from "../command";

Command.register({
    name: "restart",
    help: "stop and start the services",
    options: ["directory"],
    defaultOption: "directory",
    handler: restart,
});
