import type { Page, Locator } from 'playwright';
import { HUMAN_CONFIG } from '../config.js';

/**
 * Paced input so that sites relying on key and focus events see them in order
 */

// Random number between min and max
export function randomBetween(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

// Random delay between actions
export async function humanDelay(
  min = HUMAN_CONFIG.minActionDelay,
  max = HUMAN_CONFIG.maxActionDelay
): Promise<void> {
  const delay = randomBetween(min, max);
  await new Promise((resolve) => setTimeout(resolve, delay));
}

// Scroll the control into view before touching it
export async function humanScrollToElement(locator: Locator): Promise<void> {
  const isVisible = await locator.isVisible();

  if (!isVisible) {
    await locator.scrollIntoViewIfNeeded();
    await humanDelay(150, 300);
  }
}

// Type text key by key so input/keyup listeners fire
export async function humanType(locator: Locator, text: string): Promise<void> {
  await locator.pressSequentially(text, {
    delay: randomBetween(HUMAN_CONFIG.minTypeDelay, HUMAN_CONFIG.maxTypeDelay),
  });
}

// Fill input field with value
export async function humanFillInput(locator: Locator, value: string): Promise<void> {
  await humanScrollToElement(locator);
  await locator.click();

  // Clear existing content
  await locator.clear();
  await humanDelay(100, 200);

  await humanType(locator, value);
}

// Select option from dropdown by its visible text
export async function humanSelectOption(locator: Locator, label: string): Promise<void> {
  await humanScrollToElement(locator);
  await humanDelay(200, 400);
  await locator.selectOption({ label });
  await humanDelay(200, 400);
}

// Upload file
export async function humanUploadFile(locator: Locator, filePath: string): Promise<void> {
  await humanDelay(300, 600);
  await locator.setInputFiles(filePath);
  await humanDelay(300, 600);
}

// Tick or clear a checkbox / radio
export async function humanSetChecked(locator: Locator, checked: boolean): Promise<void> {
  await humanScrollToElement(locator);
  await locator.setChecked(checked);
  await humanDelay(150, 300);
}

// Pause between two filled fields
export async function humanBreakBetweenFields(page: Page): Promise<void> {
  await page.waitForTimeout(randomBetween(HUMAN_CONFIG.betweenFieldsMin, HUMAN_CONFIG.betweenFieldsMax));
}
