export { RecipientDirectory, parseRecipientPage, type AirtableConfig } from "./airtable.js";
