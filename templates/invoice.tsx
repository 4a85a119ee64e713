import { Document, Header, View, Text, Line, Table, Row, Cell, Break, StyleSheet } from '@pagewright/react';

interface InvoiceItem {
  description: string;
  quantity: number;
  unitPrice: number;
}

interface InvoiceData {
  invoiceNumber: string;
  date: string;
  dueDate: string;
  company: { name: string; address: string; email: string };
  billTo: { name: string; address: string };
  items: InvoiceItem[];
  taxRate: number;
  paymentTerms: string;
  notes?: string;
}

const styles = StyleSheet.create({
  muted: { fontSize: 9, color: '#64748b' },
  label: { fontSize: 9, fontWeight: 700, color: '#2563eb' },
  headCell: { padding: 2, fontSize: 9, fontWeight: 700, color: '#ffffff' },
  cell: { padding: 2, fontSize: 9, color: '#1e293b' },
});

export default function Invoice(data: InvoiceData) {
  const subtotal = data.items.reduce((sum, item) => sum + item.quantity * item.unitPrice, 0);
  const tax = subtotal * data.taxRate;
  const total = subtotal + tax;

  return (
    <Document title={`Invoice ${data.invoiceNumber}`} paperSize="Letter" margin={18} fontSize={10}>
      <Header>
        <Line style={{ fontSize: 8, color: '#94a3b8' }}>
          {data.company.name} / Invoice {data.invoiceNumber} / Page {'{{pageNumber}}'}
        </Line>
      </Header>

      <Text style={{ fontSize: 24, fontWeight: 700, color: '#2563eb' }}>INVOICE</Text>
      <Text style={styles.muted}>Invoice No: {data.invoiceNumber}</Text>
      <Text style={styles.muted}>Date: {data.date} / Due: {data.dueDate}</Text>
      <Break />

      <Table columns={[1, 1]} borders={false}>
        <Row>
          <Cell>
            <Text style={styles.label}>From</Text>
            <Text style={{ fontWeight: 700 }}>{data.company.name}</Text>
            <Text style={styles.muted}>{data.company.address}</Text>
            <Text style={styles.muted}>{data.company.email}</Text>
          </Cell>
          <Cell>
            <Text style={styles.label}>Bill To</Text>
            <Text style={{ fontWeight: 700 }}>{data.billTo.name}</Text>
            <Text style={styles.muted}>{data.billTo.address}</Text>
          </Cell>
        </Row>
      </Table>
      <Break />

      <Table columns={[9, 3, 4, 4]} borders={{ inner: true, outer: true, continuation: true, color: '#e2e8f0' }}>
        <Row style={{ backgroundColor: '#2563eb' }}>
          <Cell style={styles.headCell}><Text>Description</Text></Cell>
          <Cell style={styles.headCell}><Text style={{ textAlign: 'center' }}>Qty</Text></Cell>
          <Cell style={styles.headCell}><Text style={{ textAlign: 'right' }}>Unit Price</Text></Cell>
          <Cell style={styles.headCell}><Text style={{ textAlign: 'right' }}>Amount</Text></Cell>
        </Row>
        {data.items.map((item, i) => (
          <Row key={i} style={{ backgroundColor: i % 2 === 0 ? '#ffffff' : '#f8fafc' }}>
            <Cell style={styles.cell}><Text>{item.description}</Text></Cell>
            <Cell style={styles.cell}><Text style={{ textAlign: 'center' }}>{item.quantity}</Text></Cell>
            <Cell style={styles.cell}><Text style={{ textAlign: 'right' }}>${item.unitPrice.toFixed(2)}</Text></Cell>
            <Cell style={styles.cell}>
              <Text style={{ textAlign: 'right' }}>${(item.quantity * item.unitPrice).toFixed(2)}</Text>
            </Cell>
          </Row>
        ))}
      </Table>
      <Break />

      <Text style={{ ...styles.muted, textAlign: 'right' }}>Subtotal: ${subtotal.toFixed(2)}</Text>
      <Text style={{ ...styles.muted, textAlign: 'right' }}>
        Tax ({(data.taxRate * 100).toFixed(0)}%): ${tax.toFixed(2)}
      </Text>
      <Text style={{ fontSize: 11, fontWeight: 700, textAlign: 'right' }}>Total Due: ${total.toFixed(2)}</Text>
      <Break />

      <View style={{ padding: 4, borderWidth: 0.2, borderColor: '#e2e8f0' }}>
        <Text style={{ fontSize: 9, fontWeight: 700 }}>Payment Terms</Text>
        <Text style={styles.muted}>{data.paymentTerms}</Text>
      </View>

      {data.notes !== undefined && (
        <View style={{ paddingTop: 4 }}>
          <Text style={{ fontSize: 9, fontWeight: 700 }}>Notes</Text>
          <Text style={styles.muted}>{data.notes}</Text>
        </View>
      )}
    </Document>
  );
}
