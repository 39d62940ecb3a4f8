import { defineConfig } from '@playwright/test';

const allureDir = process.env.ALLURE_RESULTS_DIR;

export default defineConfig({
  testDir: './tests',
  reporter: allureDir
    ? [
        ['list'],
        ['allure-playwright', {
          detail: true,
          outputFolder: allureDir,
          suiteTitle: false
        }]
      ]
    : undefined,
  projects: [
    { name: 'analysis' }
  ]
});
