import { SerialPort } from 'serialport';

export interface PortInfo {
  path: string;
  vendorId?: string;
  productId?: string;
  manufacturer?: string;
}

/** List the serial ports the OS reports. */
export async function listPorts(): Promise<PortInfo[]> {
  const ports = await SerialPort.list();
  return ports.map(p => ({
    path: p.path,
    vendorId: p.vendorId?.toLowerCase(),
    productId: p.productId?.toLowerCase(),
    manufacturer: p.manufacturer,
  }));
}

/**
 * Find a serial port by USB vendor and product ID.
 * Returns the device path, or undefined if not found.
 */
export async function findPort(vendorId: number, productId: number): Promise<string | undefined> {
  const ports = await listPorts();
  const vid = vendorId.toString(16).toLowerCase().padStart(4, '0');
  const pid = productId.toString(16).toLowerCase().padStart(4, '0');

  const match = ports.find(p =>
    p.vendorId?.padStart(4, '0') === vid && p.productId?.padStart(4, '0') === pid
  );

  return match?.path;
}

export function formatPort(port: PortInfo): string {
  const vid = port.vendorId ? `0x${port.vendorId}` : '----';
  const pid = port.productId ? `0x${port.productId}` : '----';
  return `${port.path}  Vendor: ${vid}  Product: ${pid}  ${port.manufacturer || ''}`.trimEnd();
}
