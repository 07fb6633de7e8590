// STS
export { getCallerIdentity } from "./sts";
export type { CallerIdentity } from "./sts";

// CloudFormation
export { convergeStack, findStack, getStackOutputs, StackOperationError, MAX_TEMPLATE_BODY_BYTES } from "./cloudformation";
export type { ConvergeStackInput, ConvergeStackResult, StackParameters, StackStatus } from "./cloudformation";

// Lambda
export { updateFunctionCode, FunctionUpdateFailed } from "./lambda";
export type { UpdateCodeInput } from "./lambda";

// Clients
export * as Aws from "./clients/index";
