import { INTENTS, type Account, type BankingRequest, type Transaction } from "@banking-agent/shared";

/** Transactions listed in the summary prompt; older ones only count toward the total. */
export const MAX_PROMPT_TRANSACTIONS = 10;

function formatDateTime(iso: string): string {
  return iso.slice(0, 16).replace("T", " ");
}

export function classificationPrompt(request: BankingRequest): string {
  return [
    "Analyze the following customer query and determine their intent.",
    `Respond with ONLY ONE of these intents: ${INTENTS.join(", ")}`,
    "",
    `Customer Query: ${request.query}`,
    `Account Number: ${request.accountRef ?? "Not provided"}`,
    `Context: ${request.context ?? "None"}`,
    "",
    "Intent:",
  ].join("\n");
}

export function balancePrompt(account: Account): string {
  return [
    "Generate a friendly, natural response for a customer balance inquiry.",
    "",
    `Account Number: ${account.accountNumber}`,
    `Account Type: ${account.accountType}`,
    `Current Balance: ${account.balance} ${account.currency}`,
    `Account Status: ${account.status}`,
    "",
    "Provide a helpful response that includes the balance information in a conversational way.",
  ].join("\n");
}

export function transactionLine(transaction: Transaction): string {
  const description = transaction.description ? ` (${transaction.description})` : "";
  return `- ${transaction.type}: ${transaction.amount} ${transaction.currency}${description} on ${formatDateTime(
    transaction.transactionDate,
  )}`;
}

export function transactionsPrompt(accountNumber: string, transactions: readonly Transaction[]): string {
  const recent = transactions.slice(0, MAX_PROMPT_TRANSACTIONS).map(transactionLine);
  return [
    "Generate a friendly summary of the customer's recent transactions.",
    "",
    `Account Number: ${accountNumber}`,
    `Total Transactions: ${transactions.length}`,
    `Recent Transactions (last ${MAX_PROMPT_TRANSACTIONS}):`,
    ...recent,
    "",
    "Provide a helpful summary in a conversational way.",
  ].join("\n");
}

export function accountInfoPrompt(account: Account): string {
  return [
    "Generate a comprehensive summary of the customer's account information.",
    "",
    `Account Number: ${account.accountNumber}`,
    `Customer Name: ${account.customerName}`,
    `Account Type: ${account.accountType}`,
    `Balance: ${account.balance} ${account.currency}`,
    `Status: ${account.status}`,
    `Created: ${account.createdAt.slice(0, 10)}`,
    "",
    "Provide a helpful summary in a conversational, professional manner.",
  ].join("\n");
}

export function generalInquiryPrompt(request: BankingRequest): string {
  return [
    "You are a helpful banking assistant. Answer the following customer question:",
    "",
    `Question: ${request.query}`,
    `Context: ${request.context ?? "General banking inquiry"}`,
    "",
    "Provide a helpful, accurate, and professional response about banking services, policies, or general information.",
    "If the question requires account-specific information, politely ask for the account number.",
  ].join("\n");
}
