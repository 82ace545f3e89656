/**
 * Utility functions for the SDK
 */

export {
	bytesToBase58,
	stringToBytes,
	concatBytes,
} from "./encoding.js";
