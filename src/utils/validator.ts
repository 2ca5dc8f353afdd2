import { cleanDigits } from './patterns';

const ID_WEIGHTS = [7, 9, 10, 5, 8, 4, 2, 1, 6, 3, 7, 9, 10, 5, 8, 4, 2];
const ID_CHECK_CODES = ['1', '0', 'X', '9', '8', '7', '6', '5', '4', '3', '2'];

/**
 * 手機號：11 位、1 開頭、第二位 3-9
 */
export function validatePhone(phone: string): boolean {
  return /^1[3-9]\d{9}$/.test(cleanDigits(phone));
}

/**
 * 銀行卡號：16-19 位並通過 Luhn 校驗
 */
export function validateBankCard(cardNumber: string): boolean {
  const digits = cleanDigits(cardNumber);
  if (!/^\d{16,19}$/.test(digits)) return false;
  return luhnCheck(digits);
}

export function luhnCheck(number: string): boolean {
  if (!/^\d+$/.test(number)) return false;

  let sum = 0;
  let double = false;
  for (let i = number.length - 1; i >= 0; i--) {
    let digit = Number(number[i]);
    if (double) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
    double = !double;
  }
  return sum % 10 === 0;
}

/**
 * 18 位身份證號：校驗碼與出生日期都必須正確
 */
export function validateIdCard(idCard: string): boolean {
  if (!/^\d{17}[\dXx]$/.test(idCard)) return false;
  return verifyIdCardChecksum(idCard) && verifyIdCardBirthDate(idCard);
}

function verifyIdCardChecksum(idCard: string): boolean {
  let sum = 0;
  for (let i = 0; i < 17; i++) {
    sum += Number(idCard[i]) * ID_WEIGHTS[i];
  }
  return idCard[17].toUpperCase() === ID_CHECK_CODES[sum % 11];
}

function verifyIdCardBirthDate(idCard: string): boolean {
  const year = Number(idCard.slice(6, 10));
  const month = Number(idCard.slice(10, 12));
  const day = Number(idCard.slice(12, 14));

  if (year < 1900 || year > 2099) return false;
  if (month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(year, month);
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 1: case 3: case 5: case 7: case 8: case 10: case 12:
      return 31;
    case 4: case 6: case 9: case 11:
      return 30;
    case 2:
      return isLeapYear(year) ? 29 : 28;
    default:
      return 0;
  }
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}
