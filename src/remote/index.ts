export {
  type FetchLike,
  type PushJSONOptions,
  type PushJSONResponse,
  pushJSONToRemote,
} from "./push-json";
