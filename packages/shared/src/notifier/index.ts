export {
  type EmailClient,
  type PostmarkNotifierOptions,
  createPostmarkNotifier,
  formatDigestHtml,
} from "./postmark.js";
