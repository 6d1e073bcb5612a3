export { ServiceRouter, normalizeRoutingReply, DEFAULT_ORACLE_CONFIDENCE, type RouterAgents, type ServiceRouterDeps } from "./router.js";
export { classifyByRules, identifyService, identifyOperationType, isLifecycleRequest, RULE_CONFIDENCE } from "./rules.js";
export { SERVICE_KEYWORDS, OPERATION_KEYWORDS, LIFECYCLE_KEYWORDS } from "./keywords.js";
