import type { SpendingAnalysis } from './types.js';

const TOP_CATEGORIES = 5;

/**
 * Markdown summary of a spending analysis, top categories by amount
 */
export function formatSpendingAnalysis(analysis: SpendingAnalysis): string {
  const lines = [
    '💰 **Spending Analysis**',
    `• Total spent: ¥${analysis.totalSpent.toFixed(2)}`,
    `• Average per transaction: ¥${analysis.averagePerTransaction.toFixed(2)}`,
    `• Daily average: ¥${analysis.dailyAverage.toFixed(2)}`,
    `• Transactions: ${analysis.transactionCount}`,
  ];

  const categories = Object.entries(analysis.categoryBreakdown).sort((a, b) => b[1] - a[1]);
  if (categories.length > 0 && analysis.totalSpent > 0) {
    lines.push('', '**By category:**');
    for (const [category, amount] of categories.slice(0, TOP_CATEGORIES)) {
      const share = ((amount / analysis.totalSpent) * 100).toFixed(1);
      lines.push(`• ${category}: ¥${amount.toFixed(2)} (${share}%)`);
    }
  }

  return lines.join('\n');
}
