import { createLogger } from "@playroom/shared";

export const log = createLogger("api");
