export {
  createFakeIndexGateway,
  type FakeIndexGateway,
  type FakeIndexGatewayOptions,
  type GatewayMethod,
  type RecordedCall,
} from "./fake-gateway.js";
