import type { Taxable, TaxEvaluationContext, TaxRate } from '../evaluation.js';
import { applyTaxRates } from '../evaluation.js';
import { roundMoney } from '../catalog/pricing.js';

export interface ITaxEvaluator {
  // writes tax totals onto the targets in place, from the context's already discounted lines
  evaluateTaxes(context: TaxEvaluationContext, targets: Taxable[]): Promise<void>;
}

// flat rate on every line, optional overrides per tax type
export class FlatRateTaxEvaluator implements ITaxEvaluator {
  constructor(
    private readonly rate: number,
    private readonly ratesByTaxType: Record<string, number> = {}
  ) {}

  async evaluateTaxes(context: TaxEvaluationContext, targets: Taxable[]): Promise<void> {
    const rates: TaxRate[] = context.lines.map((line) => {
      const override = line.taxType ? this.ratesByTaxType[line.taxType] : undefined;
      const rate = override ?? this.rate;
      return { lineId: line.id, rate, amount: roundMoney(line.amount * rate) };
    });

    for (const target of targets) {
      applyTaxRates(target, rates);
    }
  }
}
