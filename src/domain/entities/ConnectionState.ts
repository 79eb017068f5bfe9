/**
 * State of the managed control-plane connection.
 *
 * disconnected = initial state, or the last probe failed;
 * connected = the last probe succeeded;
 * reconnecting = a request hit a connectivity failure, or the health loop is recovering.
 */
export type ConnectionState = 'disconnected' | 'connected' | 'reconnecting';

export type ConnectionStateHandler = (state: ConnectionState) => void;
