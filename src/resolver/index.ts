export {
  ModuleResolver,
  type CandidateSelector,
  type ResolveOptions,
  type AddSourceOptions,
  type ModuleResolverDeps,
} from './resolver.js';
