export { OnoffPinDriver } from './onoff-pin.driver';
