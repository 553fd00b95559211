import { parseConfig } from '../config/loader';
import type { InvoiceConfig } from '../types/config';

export const TEST_CONFIG_TOML = `
[sender]
name = "Jane Doe Consulting"
address = ["12 Example Street", "Springfield, ST 00000"]
email = "billing@example.com"
phone = "555-0100"

[client]
name = "John Smith"
company = "Example Corp"
address = "1 Client Way\\nMetropolis, ST 00001"

[bank]
account_number = "000123456789"
bank_name = "Example Bank"
ach_routing = "000000001"
wire_routing = "000000002"

[invoice]
default_rate = 150
default_description = "Consulting Services"
filename_prefix = "Invoice_Example"
number_prefix = "EX-"
`;

export function createTestConfig(overrides: Partial<InvoiceConfig['invoice']> = {}): InvoiceConfig {
  const config = parseConfig(TEST_CONFIG_TOML, 'test-config.toml');
  return { ...config, invoice: { ...config.invoice, ...overrides } };
}
