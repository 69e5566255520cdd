export { packFiles, packWithinLimit, summarize, TooManyDisks } from "./FirstFitDescending";
export type { PackSummary } from "./FirstFitDescending";
