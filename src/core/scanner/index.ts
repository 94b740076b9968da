export {
	firstTokenIndexAtOrAfter,
	forEachNode,
	locationOf,
	tokenAt,
	tokenBefore,
	tokenIndexAt,
	tokenIndexEndingAt,
} from "./navigation.js";
export { classifyToken, extensionOf, scanSource } from "./scanner.js";
