// src/config/config.ts

import { ENV } from './env';

interface ServerConfig {
    NAME: string;
    VERSION: string;
}

interface RpcConfig {
    SOCKET_PATH: string;
    MAX_FRAME_BYTES: number;
    RESTART_BACKOFF_MS: number;
    DRAIN_TIMEOUT_MS: number;
    BLOCKING_WORKERS: number;
    BLOCKING_TIMEOUT_MS: number;
}

interface Config {
    SERVER: ServerConfig;
    RPC: RpcConfig;
}

/**
 * Centralized configuration for the RPC server.
 */
export const CONFIG: Config = {
    SERVER: {
        NAME: 'logic-rpc-server',
        VERSION: '1.0.0',
    },

    RPC: {
        SOCKET_PATH: ENV.RPC_SOCKET_PATH,
        MAX_FRAME_BYTES: ENV.RPC_MAX_FRAME_BYTES,
        RESTART_BACKOFF_MS: ENV.RPC_RESTART_BACKOFF_MS,
        DRAIN_TIMEOUT_MS: ENV.RPC_DRAIN_TIMEOUT_MS,
        BLOCKING_WORKERS: ENV.RPC_BLOCKING_WORKERS,
        BLOCKING_TIMEOUT_MS: ENV.RPC_BLOCKING_TIMEOUT_MS, // per blocking call
    },
};
