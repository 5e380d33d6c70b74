import "./command_options";
import "./delete_command";
import "./help_command";
import "./restart_command";
import "./setup_command";
