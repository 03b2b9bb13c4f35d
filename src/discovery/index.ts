/**
 * Container discovery - turns flexDiscovery annotations into probe configurations
 */

// Discovery pass
export {
    createDynamicContainerConfigs,
    runDiscovery
} from './discovery';
export type {
    DiscoveryPassResult,
    DiscoveryDependencies,
    PassOptions,
    PassSettings
} from './discovery';

// Building blocks
export { mergeAnnotations, splitAssignment } from './annotations';
export {
    DISCOVERY_MARKER,
    decodeDirectiveFields,
    parseDirective,
    parseDirectives
} from './directive';
export { ClaimSet, kvFinder, matchTarget, stripContainerName } from './matcher';
export { identifySelf } from './selfIdentifier';
export {
    IP_STEPS,
    PORT_STEPS,
    effectiveIpMode,
    firstResolved,
    kubernetesPort,
    resolveCoordinates
} from './coordinates';
export type { Coordinates, ResolveContext, ResolverStep } from './coordinates';
export { decorateConfig, synthesizeConfig } from './synthesizer';
export { fanOut } from './fanout';
