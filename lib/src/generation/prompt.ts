/**
 * Prompt construction for grounded answers
 *
 * The system instruction is fixed per deployment. Retrieved context is always
 * fenced with `###` lines so passage text reads as data, not instructions.
 */

import type { LLMMessage } from '../llm/index.js';

/** Answer the model gives when the context does not cover the question */
export const NO_INFORMATION_REPLY =
  'Maalesef bu konuyla ilgili güncel verilere sahip değilim.';

/** Heading the model puts above the link list */
export const LINKS_HEADING = 'Daha Detaylı bilgi için İlgili Bağlantılar:';

export const CONTEXT_DELIMITER = '###';

export const DEFAULT_COMPANY_NAME = 'Marka Dağıtım A.Ş.';

/**
 * Build the system instruction for an assistant speaking for `companyName`.
 */
export function buildSystemPrompt(companyName: string = DEFAULT_COMPANY_NAME): string {
  return `Sen "${companyName}" şirketinin resmi AI asistanısın.
Görevin, sana sağlanan Veri tabanı (Context) içerisindeki verileri kullanarak kullanıcı sorularını yanıtlamaktır.

TALİMATLAR:
1. Sadece sana verilen "Context" içerisindeki bilgileri kullan ancak bilgiler içerisinden kullanıcının sorusuna cevap olabilecek kısımları kullan. Kendi genel bilgilerini veya tahminlerini ASLA cevaba katma.
2. Cevapların profesyonel, nazik ve öz olmalı (Maksimum 8-9 cümle).
3. Eğer "Context" içerisinde kullanıcının sorusuna dair bilgi yoksa, kibarca "${NO_INFORMATION_REPLY}" şeklinde cevap ver ve eğer varsa linklerle kullanıcıyı sayfa içerisinde yönlendirmeye çalış. Asla bilgi uydurma.
4. Link Kullanımı: Eğer context içerisinde konuyla ilgili URL'ler varsa, cevabın en altında "${LINKS_HEADING}" başlığı aç ve linkleri madde işaretleri (bullet points) halinde ve ALT ALTA şu formatta listele:
   [Linkin Tanımı]: [URL]
   [Linkin Tanımı]: [URL]

   Örnek çıktı formatı:
   Ürün detay linki: https://ornek.com/urun
   İletişim sayfası: https://ornek.com/iletisim`;
}

const ANSWER_INSTRUCTION =
  'Yukarıdaki veritabanından gelen veriyi analiz et. ' +
  'Eğer soruyla alakalıysa cevapla ve varsa ilgili ' +
  'linkleri belirtilen formatta sona ekle.';

/**
 * User turn: the query, the fenced context block, then the instruction.
 */
export function buildUserPrompt(query: string, context: string): string {
  return (
    `Soru (Query): ${query}\n\n` +
    `Data Base (Context):\n${CONTEXT_DELIMITER}\n${context}\n${CONTEXT_DELIMITER}\n\n` +
    ANSWER_INSTRUCTION
  );
}

export function buildMessages(
  systemPrompt: string,
  query: string,
  context: string
): LLMMessage[] {
  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: buildUserPrompt(query, context) },
  ];
}
