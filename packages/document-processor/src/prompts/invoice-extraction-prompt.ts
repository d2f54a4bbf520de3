import { INVOICE_EXTRACTOR } from '../config/constants';

/**
 * Build the extraction prompt for one document.
 *
 * Only the first 4000 characters of the text are included; invoice
 * headers and totals sit at the start of the document.
 */
export function buildInvoiceExtractionPrompt(normalizedText: string): string {
  const excerpt = normalizedText.slice(0, INVOICE_EXTRACTOR.PROMPT_TEXT_LIMIT);

  return `Ты проверяешь счета-фактуры. Найди в тексте документа реквизиты и верни их одним JSON-объектом.

Отвечай только JSON-объектом: без markdown, без комментариев и без текста до или после него.

Структура ответа:
{
  "invoice_number": "номер счета-фактуры",
  "date": "YYYY-MM-DD",
  "supplier": "продавец",
  "buyer": "покупатель",
  "amount": 0,
  "vat": 0,
  "vat_rate": 0,
  "contract_number": "номер договора или null",
  "payment_date": "YYYY-MM-DD или null",
  "meter_number": "номер прибора учета или null"
}

Пояснения к полям:
- date: дата составления счета-фактуры
- supplier: организация, которая выставила счет
- buyer: организация, которой выставлен счет
- amount: стоимость без НДС, число без кавычек
- vat: сумма НДС, число без кавычек
- vat_rate: ставка НДС в процентах, число без кавычек (например 20)
- если значение в тексте отсутствует, укажи null

Текст документа:
${excerpt}`;
}
