import ExcelJS from 'exceljs';
import { Item } from '../db/types';
import path from 'path';
import fs from 'fs';

/** Writes the items to an .xlsx workbook in `outDir` and returns its path. */
export const generateItemReport = async (items: Item[], outDir: string, chatId: number): Promise<string> => {
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet('Items');

    worksheet.columns = [
        { header: '#', key: 'index', width: 5 },
        { header: 'Name', key: 'name', width: 30 },
        { header: 'Amount', key: 'amount', width: 10 },
        { header: 'Type', key: 'type', width: 18 },
        { header: 'Price', key: 'price', width: 12 },
        { header: 'Available', key: 'available', width: 10 },
        { header: 'Value', key: 'value', width: 14 },
        { header: 'Created', key: 'createdAt', width: 20 }
    ];

    worksheet.getRow(1).font = { bold: true };
    worksheet.views = [{ state: 'frozen', ySplit: 1 }];

    let totalAmount = 0;
    let totalValue = 0;

    items.forEach((item, index) => {
        // Items without a price add nothing to the value total
        const value = item.price === null ? null : item.amount * item.price;
        totalAmount += item.amount;
        totalValue += value ?? 0;

        worksheet.addRow({
            index: index + 1,
            name: item.name,
            amount: item.amount,
            type: item.type,
            price: item.price,
            available: item.available ? 'yes' : 'no',
            value,
            createdAt: item.createdAt
        });
    });

    worksheet.addRow({});
    const totalsRow = worksheet.addRow({
        name: 'TOTALS',
        amount: totalAmount,
        value: Math.round(totalValue * 100) / 100
    });
    totalsRow.font = { bold: true };

    if (!fs.existsSync(outDir)) fs.mkdirSync(outDir, { recursive: true });

    const fileName = `items_${chatId}_${Date.now()}.xlsx`;
    const filePath = path.join(outDir, fileName);

    await workbook.xlsx.writeFile(filePath);
    return filePath;
};
