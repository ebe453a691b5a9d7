export {
  ProcessToolClient,
  withToolClient,
  type ProcessToolClientOptions,
  type ToolClientEvent,
  type ToolClientEventListener,
} from './process-tool-client.js';
export { ToolCatalog, type ToolSource, type ToolCatalogEntry, type ToolInvocationOutput } from './tool-catalog.js';
export {
  PROTOCOL_VERSION,
  decodeLine,
  encodeNotification,
  encodeRequest,
  parseToolCallResult,
  parseToolsList,
  renderToolContent,
  responseId,
  type IncomingMessage,
  type ToolCallResult,
  type ToolContentItem,
} from './jsonrpc.js';
export {
  describeParameters,
  formatToolListing,
  listServerTools,
  selectServers,
  toolListingToJson,
  type ListToolsOptions,
  type ServerToolListing,
  type ToolListingJson,
} from './tool-listing.js';
