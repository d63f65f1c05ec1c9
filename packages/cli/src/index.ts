export {
	NO_STACK_MESSAGE,
	type ShowStackOptions,
	handleDown,
	handleExit,
	handleFrame,
	handleHistory,
	handleShowStack,
	handleStacks,
	handleUp,
	parseShowStackArgs,
	selectRange,
} from "./commands.js";
export { formatJson, formatResponse, formatShowStack, formatTsv } from "./format.js";
export { Navigator, type NavigatorOptions, type StackLoader } from "./navigator.js";
export { type ParsedLine, parseLine } from "./parser.js";
export {
	type FrameSnapshot,
	type LoadStackOptions,
	SnapshotContext,
	SnapshotError,
	type StackSnapshot,
	buildStack,
	loadSnapshot,
	parseSnapshot,
} from "./snapshot.js";
