export { formatOutcome, formatSummary, type SummaryItem } from "./formatters";
export { color, LOGO, printLogo, ui, VERSION } from "./output";
