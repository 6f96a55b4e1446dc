export { Coords } from './Coords';
export { Battery } from './Battery';
export { Activity } from './Activity';
export { GeofenceEvent } from './GeofenceEvent';
export { Location } from './Location';
export { LocationError, InvalidErrorCodeError, errorCodeName } from './LocationError';
export { PermissionRationale } from './PermissionRationale';
export type { PermissionRationaleFields } from './PermissionRationale';
