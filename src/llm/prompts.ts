import {
  BANK_TABLE,
  BANK_TRANSACTION_TYPES,
  JOIN_KEY,
  PROVIDER_STATUSES,
  PROVIDER_TABLE,
  type ReconciliationSchema,
} from "../schema/reconciliation";

export const CLASSIFY_SYSTEM = "You are a classifier for a financial reconciliation agent.";
export const REPHRASE_SYSTEM = "You are an expert at rephrasing questions for SQL databases.";
export const SQL_SYSTEM = "You are an expert PostgreSQL query generator.";
export const ANSWER_SYSTEM = "You are a Financial Reconciliation Agent that provides accurate and helpful information.";

const vocabulary = () => `Known values:
- ${PROVIDER_TABLE}.payment_status: ${PROVIDER_STATUSES.join(", ")}
- ${BANK_TABLE}.transaction_type: ${BANK_TRANSACTION_TYPES.join(", ")}
- Both tables share ${JOIN_KEY}; join on it to compare the two systems.`;

export const CLASSIFY_TEMPLATE = (history: string, question: string) => `You are a Financial Reconciliation Agent that analyzes payment transaction data.
Decide whether the user's message is a general greeting, a data question, or a request for a list of transactions.

Rules:
1. Mentions of financial terms, payments, settlements, amounts, statuses or database entities are RELEVANT.
2. Follow-ups that refer to earlier questions or results in the chat history are RELEVANT.
3. Any store number, transaction number, PSP reference or other identifier seen in the chat history makes the message RELEVANT.
4. Greetings or small talk with no financial context are NOT RELEVANT.
5. Requests to summarize data, even over a long period or many rows, are LIST_REQUEST = false.
6. "list", "show all", "display all", "give me all", "all transactions" or "display transactions" mean LIST_REQUEST = true.
7. A time period ("April", "last month", "yesterday") together with a request for multiple transactions means LIST_REQUEST = true.
8. Asking for a set of PSP references or individual transactions means LIST_REQUEST = true.
9. When unsure whether itemized rows are wanted, use LIST_REQUEST = false.

Previous chat history:
${history}

User message: "${question}"

Reply with a JSON object with these fields:
- "is_relevant": true or false
- "is_list_request": true or false
- "response": when not relevant, a short friendly greeting; otherwise ""
- "refers_to_previous": true when the message builds on earlier questions
- "list_reasoning": one sentence on why this is or is not a list request`;

export type SynthesisMode = "summary" | "list";

export const REPHRASE_TEMPLATE = (
  mode: SynthesisMode,
  schema: ReconciliationSchema,
  history: string,
  question: string,
) => `Rephrase the user's question so a SQL agent can answer it from the database below.
${
  mode === "summary"
    ? `The database is large: always rephrase towards a summary. Start with "Summarize" or "Provide a summary of".`
    : `The user wants individual transactions: rephrase as an itemized request that starts with "List".`
}

Principles:
1. Keep every filter from the original question exactly: payment status or transaction type, payment method, date ranges, amount thresholds, store numbers, channel names and references.
2. When the question compares or reconciles records, say explicitly "compare the provider records in ${PROVIDER_TABLE} with the bank records in ${BANK_TABLE}" and name the comparison points:
   - payment_amount against captured_amount
   - payment_status against transaction_type
   - transaction_datetime on both sides
   - matching on ${JOIN_KEY}
   - transactions missing from either side${mode === "summary" ? "\n   - how many transactions match and how many do not" : ""}
3. Resolve references to earlier questions using the chat history.
4. Output only the rephrased question.

${vocabulary()}

Database:
${schema.ddl}

Previous chat history:
${history}

Original question: ${question}
Rephrased question:`;

export const SQL_TEMPLATE = (schema: ReconciliationSchema, history: string, rephrased: string, maxRows: number) => `Write one PostgreSQL query that answers the question.

Guidelines:
1. Select the relevant, specific columns. Never use SELECT *.
2. Use JOINs on ${JOIN_KEY} only when the data spans both tables; pick LEFT, RIGHT, INNER or FULL OUTER JOIN as needed.
3. Handle date ranges with proper date functions; use CURRENT_DATE for "today".
4. For summaries ("Summarize", "Provide", "Give") query a single table where possible and aggregate with COUNT, SUM or AVG.
5. Questions about one PSP reference, transaction number, merchant id, store number or merchant reference return only the matching rows.
6. Never return more than ${maxRows} rows; add LIMIT ${maxRows} when the result could be larger.
7. Handle NULL values, and name columns explicitly in GROUP BY and ORDER BY.

Constraints:
- Read-only: no INSERT, UPDATE, DELETE, DROP, ALTER, CREATE, TRUNCATE or any other DML/DDL.
- Exactly one statement, no semicolons.
- Only columns that exist in the schema below.
- Output the SQL only, no explanation.

${vocabulary()}

Schema:
${schema.ddl}

Previous chat history:
${history}

Question: ${rephrased}
SQL:`;

export const LIST_SQL_TEMPLATE = (
  schema: ReconciliationSchema,
  history: string,
  rephrased: string,
  maxRows: number,
  providerColumns: string[],
  bankColumns: string[],
) => `Write one PostgreSQL query that retrieves the individual transactions for this request:

"${rephrased}"

Guidelines:
1. Include the columns needed to understand each transaction.
2. From ${PROVIDER_TABLE} include: ${providerColumns.join(", ")}.
3. From ${BANK_TABLE} include: ${bankColumns.join(", ")}.
4. Join on ${JOIN_KEY} when the request spans both tables.
5. Filter by every condition in the request (dates, status, amounts, stores, methods).
6. No aggregation (SUM, COUNT, AVG): return individual rows.
7. ORDER BY transaction_datetime DESC unless another order is requested.
8. LIMIT ${maxRows}.

Constraints:
- Read-only, exactly one statement, no semicolons, never SELECT *.
- Output the SQL only, no explanation.

${vocabulary()}

Schema:
${schema.ddl}

Previous chat history:
${history}

SQL:`;

export const ANSWER_TEMPLATE = (input: {
  history: string;
  question: string;
  sql: string;
  sampleJson: string;
  sampleSize: number;
  columns: string[];
  rowCount: number;
  exportUrl: string | null;
}) => `Answer the user's question using only the SQL result below. Do not invent data.
Use a friendly tone with a few emojis or symbols (✅, ⬆️, 👍) and format tables where useful.
The SQL result holds the first ${input.sampleSize} of ${input.rowCount} rows; use the total row count for totals and never assume the sample is everything.
${
  input.exportUrl
    ? `A CSV file with the full result is available. End the answer with the exact text "Download URL: " followed by the URL, not as a Markdown link.`
    : "No CSV file was generated; do not mention downloads."
}

Previous chat history:
${input.history}

Question: ${input.question}
SQL Query: ${input.sql}
SQL Result: ${input.sampleJson}
Column Names: ${input.columns.join(", ")}
Total Row Count: ${input.rowCount}
CSV Download URL: ${input.exportUrl ?? "none"}
Answer:`;
