import { remove } from "../actions";
import { Command } from "../command";

Command.register({
    name: "delete",
    alt: ["down"],
    help: "remove all containers and volumes",
    options: ["directory"],
    defaultOption: "directory",
    handler: remove,
});
