export { HttpRemote, createHttpRemote, remoteErrorForStatus } from './http.js';
export type {
  FetchFunction,
  HttpRemoteConfig,
  PullResult,
  PushRequest,
  PushResult,
  RemoteApi,
} from './types.js';
