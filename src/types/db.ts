import type { ColumnType, Generated, Insertable, Selectable } from "kysely";

// timestamptz columns filled by the database on insert
type CreatedAt = ColumnType<Date, Date | string | undefined, Date | string>;

export type OrderStatus = "PENDING" | "CONFIRMED" | "CANCELED";
export type PaymentStatus = "PENDING" | "CONFIRMED" | "FAILED";
export type PaymentMethod = "CARD" | "TRANSFER" | "COD";
export type ReservationStatus = "reserved" | "released";

export interface BrandTable {
  id: Generated<number>;
  name: string;
  is_active: Generated<boolean>;
  created_at: CreatedAt;
}

export interface CategoryTable {
  id: Generated<number>;
  name: string;
  is_active: Generated<boolean>;
  created_at: CreatedAt;
}

export interface ProductTable {
  id: Generated<number>;
  name: string;
  sku: string;
  price: number;
  is_active: Generated<boolean>;
  brand_id: number;
  category_id: number;
  created_at: CreatedAt;
}

export interface WarehouseTable {
  id: Generated<number>;
  name: string;
  city: string;
  created_at: CreatedAt;
}

export interface StockTable {
  id: Generated<number>;
  product_id: number;
  warehouse_id: number;
  qty: Generated<number>;
  reserved: Generated<number>;
  updated_at: CreatedAt;
  created_at: CreatedAt;
}

export interface CustomerTable {
  id: Generated<number>;
  full_name: string;
  email: string;
  created_at: CreatedAt;
}

export interface OrderTable {
  id: Generated<number>;
  customer_id: number;
  status: ColumnType<OrderStatus, OrderStatus | undefined, OrderStatus>;
  created_at: CreatedAt;
}

export interface OrderItemTable {
  id: Generated<number>;
  order_id: number;
  product_id: number;
  qty: number;
  unit_price: number;
  created_at: CreatedAt;
}

export interface PaymentTable {
  id: Generated<number>;
  order_id: number;
  method: PaymentMethod;
  amount: number;
  status: ColumnType<PaymentStatus, PaymentStatus | undefined, PaymentStatus>;
  created_at: CreatedAt;
}

export interface StockReservationTable {
  id: Generated<number>;
  order_id: number;
  stock_id: number;
  qty: number;
  status: ColumnType<
    ReservationStatus,
    ReservationStatus | undefined,
    ReservationStatus
  >;
  created_at: CreatedAt;
}

export interface DB {
  brands: BrandTable;
  categories: CategoryTable;
  products: ProductTable;
  warehouses: WarehouseTable;
  stocks: StockTable;
  customers: CustomerTable;
  orders: OrderTable;
  order_items: OrderItemTable;
  payments: PaymentTable;
  stock_reservations: StockReservationTable;
}

export type Brand = Selectable<BrandTable>;
export type Category = Selectable<CategoryTable>;
export type Product = Selectable<ProductTable>;
export type NewProduct = Insertable<ProductTable>;
export type Warehouse = Selectable<WarehouseTable>;
export type Stock = Selectable<StockTable>;
export type Customer = Selectable<CustomerTable>;
export type Order = Selectable<OrderTable>;
export type OrderItem = Selectable<OrderItemTable>;
export type NewOrderItem = Insertable<OrderItemTable>;
export type Payment = Selectable<PaymentTable>;
export type StockReservation = Selectable<StockReservationTable>;
