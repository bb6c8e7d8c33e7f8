export { createDatabase, initializeDatabase, IN_MEMORY_DATABASE } from "./schema.js";
export {
  upsertOrder,
  getOrderById,
  getAllOrders,
  updateOrderStatus,
  replacePolicyChunks,
  getAllPolicyChunks,
  type UpdateOrderOutcome,
} from "./operations.js";
export {
  SqliteOrderRepository,
  SqlitePolicyChunkRepository,
  type OrderRepository,
  type PolicyChunkRepository,
} from "./repositories.js";
