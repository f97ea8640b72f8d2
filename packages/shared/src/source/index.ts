export {
  type SubstackSourceOptions,
  createSubstackSource,
  findLatestPostUrl,
  extractPostText,
} from "./substack.js";
