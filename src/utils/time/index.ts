export { now, formatGameTime } from './time';
export { calculateHoursDelta, isGateDue } from './helpers';
