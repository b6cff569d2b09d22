export {
  MembershipGate,
  withGate,
  type IAccessGate,
  type GatedContext,
  type GatedHandler,
  type MembershipGateDependencies,
} from './MembershipGate';
