import type { Context } from "@opentelemetry/api";

import type { ChatClient, ProviderRegistry } from "@banking-agent/llm";
import {
  createLogger,
  errorMessage,
  parseIntent,
  type BankingRequest,
  type BankingResponse,
  type Intent,
} from "@banking-agent/shared";
import {
  BankingAttributes,
  bestEffort,
  boundedProviderLabel,
  MAX_QUERY_CHARS,
  recordBusinessEvent,
  tracedCompletion,
  truncate,
  withBusinessSpan,
  type Telemetry,
} from "@banking-agent/telemetry";

import type { AccountService } from "./account_service";
import {
  accountInfoPrompt,
  balancePrompt,
  classificationPrompt,
  generalInquiryPrompt,
  transactionsPrompt,
} from "./prompts";
import type { TransactionService } from "./transaction_service";

const log = createLogger({ component: "banking-agent" });

export const PROCESS_REQUEST_SPAN = "banking.process_request";
export const DETERMINE_INTENT_SPAN = "banking.determine_intent";
export const REQUEST_PROCESSED_EVENT = "banking_request_processed";

export const NEEDS_QUERY_MESSAGE = "Please tell me what you would like help with.";
export const ACCOUNT_NOT_FOUND_MESSAGE = "Account not found. Please verify your account number.";
export const NO_TRANSACTIONS_MESSAGE = "No transactions found for this account.";
const ERROR_PREFIX = "I apologize, but I encountered an error processing your request: ";

const CLASSIFY_TEMPERATURE = 0;
const GENERATE_TEMPERATURE = 0.7;

export interface BankingAgentDeps {
  accounts: AccountService;
  transactions: TransactionService;
  registry: Pick<ProviderRegistry, "resolve" | "defaultName">;
  telemetry: Telemetry;
}

interface HandlerContext {
  request: BankingRequest;
  intent: Intent;
  provider: string;
  client: ChatClient;
  parent: Context;
}

type Handler = (ctx: HandlerContext) => Promise<BankingResponse>;

/**
 * Answers a natural-language banking question with two model calls: one to
 * classify the intent, one to phrase the answer from account data.
 */
export class BankingAgent {
  private readonly handlers: Record<Intent, Handler>;

  constructor(private readonly deps: BankingAgentDeps) {
    const general: Handler = (ctx) => this.handleGeneralInquiry(ctx);
    this.handlers = {
      CHECK_BALANCE: (ctx) => this.handleCheckBalance(ctx),
      VIEW_TRANSACTIONS: (ctx) => this.handleViewTransactions(ctx),
      ACCOUNT_INFO: (ctx) => this.handleAccountInfo(ctx),
      // Money movement goes through the transaction endpoints, never the model.
      DEPOSIT: general,
      WITHDRAWAL: general,
      TRANSFER: general,
      GENERAL_INQUIRY: general,
    };
  }

  async processRequest(request: BankingRequest, requestedProvider?: string): Promise<BankingResponse> {
    const requested = requestedProvider?.trim().toLowerCase() || this.deps.registry.defaultName;

    if (request.query.trim() === "") {
      return { message: NEEDS_QUERY_MESSAGE, status: "PENDING", providerUsed: requested };
    }

    const { telemetry } = this.deps;
    return withBusinessSpan(
      telemetry,
      PROCESS_REQUEST_SPAN,
      {
        [BankingAttributes.PROVIDER]: requested,
        [BankingAttributes.ACCOUNT_NUMBER]: request.accountRef ?? "none",
        [BankingAttributes.USER_QUERY]: truncate(request.query, MAX_QUERY_CHARS),
      },
      async (scope) => {
        let provider = requested;
        let intent: Intent = "GENERAL_INQUIRY";
        let response: BankingResponse;

        try {
          const resolved = this.deps.registry.resolve(requested);
          provider = resolved.provider;
          bestEffort("processRequest.provider", () => scope.span.setAttribute(BankingAttributes.PROVIDER, provider));

          intent = await this.classify(request, provider, resolved.client, scope.context);
          bestEffort("processRequest.intent", () => scope.span.setAttribute(BankingAttributes.INTENT, intent));
          log.debug({ intent, provider }, "Classified request");

          response = await this.handlers[intent]({
            request,
            intent,
            provider,
            client: resolved.client,
            parent: scope.context,
          });
        } catch (error) {
          log.error({ err: error, provider, intent }, "Banking request failed");
          bestEffort("processRequest.exception", () =>
            scope.span.recordException(error instanceof Error ? error : new Error(String(error))),
          );
          response = { message: `${ERROR_PREFIX}${errorMessage(error)}`, status: "ERROR", providerUsed: provider };
        }

        bestEffort("processRequest.status", () =>
          scope.span.setAttribute(BankingAttributes.RESPONSE_STATUS, response.status),
        );
        recordBusinessEvent(
          telemetry,
          REQUEST_PROCESSED_EVENT,
          { provider, intent, status: response.status, account: request.accountRef ?? "none" },
          scope.context,
        );
        bestEffort("processRequest.metrics", () =>
          telemetry.metrics.bankingRequestsTotal.inc({
            provider: boundedProviderLabel(provider),
            intent,
            status: response.status,
          }),
        );
        return response;
      },
      { failureOf: (response) => (response.status === "ERROR" ? response.message : null) },
    );
  }

  private classify(request: BankingRequest, provider: string, client: ChatClient, parent: Context): Promise<Intent> {
    const { telemetry } = this.deps;
    return withBusinessSpan(
      telemetry,
      DETERMINE_INTENT_SPAN,
      {
        [BankingAttributes.PROVIDER]: provider,
        [BankingAttributes.USER_QUERY]: truncate(request.query, MAX_QUERY_CHARS),
      },
      async (scope) => {
        const result = await tracedCompletion(
          telemetry,
          client,
          { prompt: classificationPrompt(request), temperature: CLASSIFY_TEMPERATURE },
          { operationType: "classify_intent", provider, parent: scope.context, accountRef: request.accountRef },
        );
        const intent = parseIntent(result.text);
        bestEffort("determineIntent.intent", () => scope.span.setAttribute(BankingAttributes.INTENT, intent));
        return intent;
      },
      { parent },
    );
  }

  private async generate(ctx: HandlerContext, prompt: string): Promise<string> {
    const result = await tracedCompletion(
      this.deps.telemetry,
      ctx.client,
      { prompt, temperature: GENERATE_TEMPERATURE },
      {
        operationType: "generate_response",
        provider: ctx.provider,
        parent: ctx.parent,
        intent: ctx.intent,
        accountRef: ctx.request.accountRef,
      },
    );
    return result.text;
  }

  private missingAccount(ctx: HandlerContext, action: string): BankingResponse {
    return {
      message: `To ${action}, please provide your account number.`,
      status: "ERROR",
      providerUsed: ctx.provider,
    };
  }

  private accountNotFound(ctx: HandlerContext): BankingResponse {
    return { message: ACCOUNT_NOT_FOUND_MESSAGE, status: "ERROR", providerUsed: ctx.provider };
  }

  private async handleCheckBalance(ctx: HandlerContext): Promise<BankingResponse> {
    const { accountRef } = ctx.request;
    if (!accountRef) return this.missingAccount(ctx, "check your balance");

    const account = await this.deps.accounts.findByAccountNumber(accountRef);
    if (!account) return this.accountNotFound(ctx);

    const message = await this.generate(ctx, balancePrompt(account));
    return { message, data: account, status: "SUCCESS", providerUsed: ctx.provider };
  }

  private async handleViewTransactions(ctx: HandlerContext): Promise<BankingResponse> {
    const { accountRef } = ctx.request;
    if (!accountRef) return this.missingAccount(ctx, "view transactions");

    const account = await this.deps.accounts.findByAccountNumber(accountRef);
    if (!account) return this.accountNotFound(ctx);

    const transactions = await this.deps.transactions.getTransactionHistory(account.accountNumber);
    if (transactions.length === 0) {
      return { message: NO_TRANSACTIONS_MESSAGE, data: transactions, status: "SUCCESS", providerUsed: ctx.provider };
    }

    const message = await this.generate(ctx, transactionsPrompt(account.accountNumber, transactions));
    return { message, data: transactions, status: "SUCCESS", providerUsed: ctx.provider };
  }

  private async handleAccountInfo(ctx: HandlerContext): Promise<BankingResponse> {
    const { accountRef } = ctx.request;
    if (!accountRef) return this.missingAccount(ctx, "view account information");

    const account = await this.deps.accounts.findByAccountNumber(accountRef);
    if (!account) return this.accountNotFound(ctx);

    const message = await this.generate(ctx, accountInfoPrompt(account));
    return { message, data: account, status: "SUCCESS", providerUsed: ctx.provider };
  }

  private async handleGeneralInquiry(ctx: HandlerContext): Promise<BankingResponse> {
    const message = await this.generate(ctx, generalInquiryPrompt(ctx.request));
    return { message, status: "SUCCESS", providerUsed: ctx.provider };
  }
}
