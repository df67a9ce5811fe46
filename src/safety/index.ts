export { SafetyService } from './safety-service.js'
export type { AssessOptions, AuditExport, SafetyServiceDeps } from './safety-service.js'
export { compileLexicon, extract } from './signal-extractor.js'
export type { CompiledLexicon } from './signal-extractor.js'
export { classify, classifierPolicyFrom } from './risk-classifier.js'
export { newConversation, transition } from './state-machine.js'
export { decide, fixedSafety, resolvePayload } from './response-arbiter.js'
export { KeyedSerializer } from './keyed-serializer.js'
export * from './types.js'
