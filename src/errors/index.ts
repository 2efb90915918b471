export {
	InternalError,
	InvalidArgumentError,
	isInvalidArgumentError,
} from "./errors";
