export {
  DigestMailer,
  createSmtpTransport,
  type MailTransport,
  type SmtpConfig,
} from "./smtp.js";
