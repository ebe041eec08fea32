export const CLI_NAME = "logtint";
