export { createExchangeGateway } from "./createExchangeGateway";
export type { GatewayOverrides } from "./createExchangeGateway";
