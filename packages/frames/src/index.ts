export { clipSelf, frameDescription, frameInfo, signatureWithOwner } from "./describe.js";
export { NavigationError, isNavigationError } from "./errors.js";
export { Frame, type FrameInit } from "./frame.js";
export { FrameStack, type FrameStackOptions } from "./frame-stack.js";
export { StackRegistry } from "./stack-registry.js";
