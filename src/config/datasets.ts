import type { ColumnType } from '../ingress/dataset.js';

export interface ColumnSpec {
  type: ColumnType;
  /** Standardized header names that are renamed to this column on load. */
  aliases?: readonly string[];
}

export interface DatasetSpec {
  name: string;
  file: string;
  columns: Readonly<Record<string, ColumnSpec>>;
}

const id: ColumnSpec = { type: 'id' };
const text: ColumnSpec = { type: 'text' };
const integer: ColumnSpec = { type: 'integer' };
const decimal: ColumnSpec = { type: 'decimal' };
const money: ColumnSpec = { type: 'money' };

export const datasetLayout = {
  extracted: {
    sales: {
      name: 'sales',
      file: 'sales.csv',
      columns: {
        trans_id: { type: 'id', aliases: ['sale_id', 'transaction_id'] },
        date: { type: 'date', aliases: ['sale_date'] },
        total_revenue: { type: 'money', aliases: ['revenue'] },
        quantity: integer,
        product_id: id,
        store_id: id,
        customer_id: id
      }
    },
    products: {
      name: 'products',
      file: 'products.csv',
      columns: {
        product_id: id,
        product_name: text,
        unit_cost: money,
        unit_price: money
      }
    },
    reviews: {
      name: 'reviews',
      file: 'reviews.csv',
      columns: {
        review_id: id,
        product_id: id,
        rating: integer,
        review_text: { type: 'text', aliases: ['review', 'comment'] }
      }
    }
  },
  transformed: {
    factSales: {
      name: 'Fact_Sales',
      file: 'Fact_Sales.csv',
      columns: {
        sale_id: { type: 'id', aliases: ['trans_id'] },
        date_id: id,
        date: { type: 'date', aliases: ['sale_date'] },
        product_id: id,
        store_id: id,
        customer_id: id,
        quantity: integer,
        total_revenue: money,
        cost: { type: 'money', aliases: ['product_cost'] },
        gross_profit: money,
        shipping_cost_total: { type: 'money', aliases: ['shipping_cost'] },
        allocated_marketing_dzd: { type: 'money', aliases: ['marketing_cost'] },
        net_profit: money
      }
    },
    dimProduct: {
      name: 'Dim_Product',
      file: 'Dim_Product.csv',
      columns: {
        product_id: id,
        product_name: text,
        category_name: { type: 'text', aliases: ['category'] },
        subcat_name: { type: 'text', aliases: ['subcategory_name', 'subcategory'] },
        unit_cost: money,
        avg_sentiment: { type: 'decimal', aliases: ['sentiment_score'] },
        competitor_price: money,
        price_difference_pct: decimal
      }
    },
    dimDate: {
      name: 'Dim_Date',
      file: 'Dim_Date.csv',
      columns: {
        date_id: id,
        date: { type: 'date', aliases: ['full_date'] },
        day_of_week: integer
      }
    },
    dimStore: {
      name: 'Dim_Store',
      file: 'Dim_Store.csv',
      columns: {
        store_id: id,
        store_name: text,
        monthly_target: money
      }
    },
    dimCustomer: {
      name: 'Dim_Customer',
      file: 'Dim_Customer.csv',
      columns: {
        customer_id: id,
        customer_name: text
      }
    }
  }
} as const satisfies {
  extracted: Record<string, DatasetSpec>;
  transformed: Record<string, DatasetSpec>;
};

/** Warehouse tables compared between the CSV export and the database, in report order. */
export const RECONCILED_TABLES = [
  'Dim_Customer',
  'Dim_Date',
  'Dim_Product',
  'Dim_Store',
  'Fact_Sales'
] as const;
