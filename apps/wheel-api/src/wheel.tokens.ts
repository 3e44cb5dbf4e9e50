export const WHEEL_STATE_MACHINE = Symbol("WHEEL_STATE_MACHINE");
