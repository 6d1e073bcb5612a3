export type { AgentKind, ResourceAgent } from "./types.js";
export { Ec2CreateAgent } from "./ec2-create.js";
export { Ec2LifecycleAgent } from "./ec2-lifecycle.js";
export { toCreateInstancesRequest, toResourceTags } from "./ec2-request.js";
