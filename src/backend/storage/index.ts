/**
 * Data storage modules
 *
 * - JsonFileAuthStore: one JSON file per bot under data/auth
 * - InMemoryAuthStore: non-persistent store with the same interface
 */

export {
    JsonFileAuthStore,
    InMemoryAuthStore,
    createJsonFileAuthStore,
    serializeAuthRecord,
    deserializeAuthRecord,
    type AuthStore,
    type JsonFileAuthStoreConfig,
} from './authStore';
