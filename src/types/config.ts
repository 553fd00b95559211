export interface SenderConfig {
  name: string;
  address: string[];
  email: string;
  phone: string | null;
}

export interface ClientConfig {
  name: string;
  company: string | null;
  address: string[];
}

export interface BankConfig {
  accountHolder: string;
  accountNumber: string;
  bankName: string | null;
  achRouting: string | null;
  wireRouting: string | null;
  swift: string | null;
}

export interface InvoiceDefaults {
  defaultRate: bigint;
  defaultDescription: string;
  filenamePrefix: string;
  numberPrefix: string;
  currency: string;
  locale: string;
  taxRate: bigint;
}

export interface InvoiceConfig {
  sender: SenderConfig;
  client: ClientConfig;
  bank: BankConfig;
  invoice: InvoiceDefaults;
}
