/**
 * Example usage of the shipment platform
 * Seeds the in-memory stores, uploads a small batch and walks it through checkout
 */

import {
  COLUMN_LABELS,
  createInMemoryPlatform,
  InMemorySavedAddressRepository,
  InMemorySavedPackageRepository,
  seedSampleData,
} from './index';

const blankSender = ['', '', '', '', '', '', ''];

const SAMPLE_CSV = [
  ['Ship From', '', '', '', '', '', '', 'Ship To', '', '', '', '', '', '', 'Package', '', '', '', '', 'Contact', '', 'Reference', ''],
  [...COLUMN_LABELS],
  [...blankSender, 'Salma', 'Reyes', '77 Orchard Ln', '', 'Pomona', '91766', 'CA', '1', '4', '8', '6', '4', '', '', 'A-1001', 'MUG-01'],
  ['Warehouse', 'East', '9 Dock Rd', '', 'Fontana', '92335', 'CA', 'Lee', 'Park', '18 Birch St', 'Apt 2', 'Upland', '91786', 'CA', '0', '6', '', '', '', '', '', 'A-1002', 'PIN-02'],
  [...blankSender, '', '', '5 Cedar Ct', '', 'Chino', '91710', 'CA', '2', '0', '10', '10', '10', '', '', 'A-1003', 'BOX-03'],
]
  .map((row) => row.join(','))
  .join('\n');

async function exampleUsage() {
  const addresses = new InMemorySavedAddressRepository();
  const packages = new InMemorySavedPackageRepository();
  await seedSampleData(addresses, packages);

  const platform = createInMemoryPlatform({ addresses, packages });

  const upload = await platform.uploadShipments(SAMPLE_CSV);
  console.log(`Created ${upload.createdCount} shipments, ${upload.errorCount} errors`);

  const shipments = await platform.listShipments();
  for (const shipment of shipments) {
    console.log(`\n${shipment.orderNo}: ${shipment.status}`);
    shipment.validationIssues.forEach((issue) => console.log(`  - ${issue}`));
  }

  const [standardBox] = (await platform.listPackages()).filter((pkg) => pkg.name === 'Standard Box');
  if (standardBox) {
    const { updated } = await platform.bulkUpdate({
      shipmentIds: shipments.map((shipment) => shipment.id),
      packageId: standardBox.id,
    });
    console.log(`\nApplied "${standardBox.name}" to ${updated} shipments`);
  }

  console.log('\nAvailable services for 1 lb 4 oz:');
  platform.listServices({ weight_lbs: '1', weight_oz: '4' }).forEach((quote) => {
    console.log(`  ${quote.name}: $${quote.price.toFixed(2)}`);
  });

  const ids = shipments.map((shipment) => shipment.id);
  await platform.bulkSelectService({ shipmentIds: ids, service: 'cheapest' });

  try {
    const order = await platform.purchase({ shipmentIds: ids, labelSize: '4x6', termsAccepted: true });
    console.log(`\n${order.message}: order ${order.orderId}, ${order.shipmentCount} labels, $${order.grandTotal.toFixed(2)}`);
  } catch (error) {
    console.error('Purchase failed:', error instanceof Error ? error.message : error);
  }
}

// Run the example
if (require.main === module) {
  exampleUsage().catch(console.error);
}

export { exampleUsage };
