export { CommandBus } from './CommandBus';
export type { CommandBusOptions, PorcelainHandler, PorcelainHandlers } from './CommandBus';
export { EventBus } from './EventBus';
export type { EventBusOptions, EventCallback } from './EventBus';
