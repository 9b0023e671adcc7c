import * as path from 'path';
import * as fs from 'fs';
import { generateSurveySheets, writeWorkbook } from './workbookFixtures';

// Parse command line arguments
const args = process.argv.slice(2);
const stationCount = args[0] ? parseInt(args[0], 10) : 20;
const cruiseId = args[1] ? parseInt(args[1], 10) : 1;

if (isNaN(stationCount) || stationCount < 1 || isNaN(cruiseId)) {
  console.error('Error: Invalid arguments');
  console.error('Usage: npm run sample -- <station_count> [cruise_id]');
  console.error('  station_count: Number of stations to generate (default: 20)');
  console.error('  cruise_id: Cruise number written to every station (default: 1)');
  process.exit(1);
}

const outputPath = path.join(__dirname, `survey-${stationCount}.xlsx`);

(async () => {
  try {
    const sheets = generateSurveySheets(stationCount, cruiseId);
    await writeWorkbook(outputPath, sheets);

    const fileSizeKB = (fs.statSync(outputPath).size / 1024).toFixed(1);
    console.log(`\n✓ Generated survey workbook:`);
    console.log(`  Path: ${outputPath}`);
    for (const sheet of sheets) {
      console.log(`  ${sheet.name}: ${sheet.rows.length} rows`);
    }
    console.log(`  Size: ${fileSizeKB} KB`);
  } catch (error) {
    console.error('Error generating workbook:', error);
    process.exit(1);
  }
})();
